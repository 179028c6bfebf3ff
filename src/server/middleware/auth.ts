/**
 * Shared-secret authentication for the ingest endpoint
 * Compares the X-Api-Key header against the configured API_KEY
 */

import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";
import { logger } from "../../lib/logger";
import { ingestRejectedTotal } from "../../lib/prometheus";

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Build an onRequest hook enforcing the shared secret.
 *
 * With no secret configured every request passes (open mode, for
 * deployments on a trusted network). The hook runs before the body is
 * parsed, so a rejected request has no side effects.
 */
export function createApiKeyAuth(apiKey: string | undefined) {
  return async function apiKeyAuth(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | undefined> {
    if (!apiKey) {
      return undefined;
    }

    const header = request.headers["x-api-key"];
    const provided = Array.isArray(header) ? header[0] : header;

    if (provided !== undefined && secretsMatch(provided, apiKey)) {
      return undefined;
    }

    logger.warn(
      { url: request.url, ip: request.ip, headerPresent: provided !== undefined },
      "Ingest request rejected: invalid API key",
    );
    ingestRejectedTotal.inc({ reason: "auth" });

    return reply.status(403).send({
      error: "Forbidden: invalid API key",
      code: "INVALID_API_KEY",
    });
  };
}
