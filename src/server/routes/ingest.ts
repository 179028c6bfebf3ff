/**
 * Alert ingest route
 * POST /v1/ingest - accept an alert from an upstream tool and fan it out
 */

import type { FastifyInstance } from "fastify";
import type { AlertCoordinator } from "../../alerting/coordinator";
import type { DeliveryOutcome } from "../../alerting/types";
import { ingestRejectedTotal } from "../../lib/prometheus";
import {
  type DeliveryResult,
  IngestRequestSchema,
  type IngestResponse,
} from "../../types/schemas/ingest";
import { createApiKeyAuth } from "../middleware/auth";

export interface IngestRouteDeps {
  apiKey?: string;
  coordinator: AlertCoordinator;
}

function toDeliveryResult(outcome: DeliveryOutcome): DeliveryResult {
  return outcome.status === "sent"
    ? { recipient_id: outcome.recipientId, status: "sent" }
    : {
        recipient_id: outcome.recipientId,
        status: "error",
        error: outcome.error,
      };
}

/**
 * Register the ingest route
 *
 * Request body (any content type, parsed as JSON):
 *   summary: string (default "Alert")
 *   severity: integer 0-10 (default 5)
 *   details: object (optional)
 *   tags: string[] (optional)
 *
 * Response:
 *   200 OK: { accepted, forwarded, reason?, results? }
 *   400 Bad Request: invalid JSON or a non-object body
 *   403 Forbidden: missing or wrong X-Api-Key
 */
export async function registerIngestRoutes(
  app: FastifyInstance,
  deps: IngestRouteDeps,
): Promise<void> {
  app.post(
    "/v1/ingest",
    { onRequest: createApiKeyAuth(deps.apiKey) },
    async (request, reply) => {
      const parseResult = IngestRequestSchema.safeParse(request.body);
      if (!parseResult.success) {
        ingestRejectedTotal.inc({ reason: "validation" });
        return reply.status(400).send({
          error: "Validation failed",
          code: "VALIDATION_ERROR",
          issues: parseResult.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        });
      }

      const { summary, severity, details, tags } = parseResult.data;
      const result = await deps.coordinator.forward({
        summary,
        severity,
        details,
        tags,
      });

      const body: IngestResponse = result.forwarded
        ? {
            accepted: true,
            forwarded: true,
            results: result.results.map(toDeliveryResult),
          }
        : { accepted: true, forwarded: false, reason: result.reason };

      return reply.status(200).send(body);
    },
  );
}
