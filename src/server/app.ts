import Fastify, { type FastifyBaseLogger } from "fastify";
import { ZodError } from "zod";
import type { AlertCoordinator } from "../alerting/coordinator";
import { type Logger, logger as defaultLogger } from "../lib/logger";
import {
  getMetrics,
  getMetricsContentType,
  ingestRejectedTotal,
} from "../lib/prometheus";
import { registerIngestRoutes } from "./routes/ingest";

export interface AppDeps {
  /** Shared ingest secret; undefined runs the endpoint in open mode */
  apiKey?: string;
  coordinator: AlertCoordinator;
  logger?: Logger;
}

/**
 * Raised by the body parser when a request body is not valid JSON
 */
class InvalidJsonError extends Error {
  readonly statusCode = 400;
  readonly code = "INVALID_JSON";

  constructor(cause: unknown) {
    super("Invalid JSON", { cause });
    this.name = "InvalidJsonError";
  }
}

function clientErrorStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return undefined;
}

export async function createApp(deps: AppDeps) {
  const logger = deps.logger ?? defaultLogger;
  const fastifyLogger: FastifyBaseLogger = logger;
  const app = Fastify({
    loggerInstance: fastifyLogger,
    trustProxy: true,
  });

  // Upstream tools are inconsistent about Content-Type: parse every body as JSON
  app.removeAllContentTypeParsers();
  app.addContentTypeParser(
    "*",
    { parseAs: "string" },
    (_request, body, done) => {
      try {
        done(null, JSON.parse(String(body)));
      } catch (error) {
        done(new InvalidJsonError(error), undefined);
      }
    },
  );

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof InvalidJsonError) {
      ingestRejectedTotal.inc({ reason: "invalid_json" });
      return reply.status(400).send({
        error: "Invalid JSON",
        code: error.code,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    const status = clientErrorStatus(error);
    if (status !== undefined) {
      return reply.status(status).send({
        error: error instanceof Error ? error.message : "Bad request",
        code: "BAD_REQUEST",
      });
    }

    logger.error(
      { error, url: request.url, method: request.method },
      "Unhandled error",
    );

    return reply.status(500).send({
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/ready", async () => ({ ready: true }));

  app.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.type(getMetricsContentType()).send(metrics);
  });

  await registerIngestRoutes(app, {
    apiKey: deps.apiKey,
    coordinator: deps.coordinator,
  });

  return app;
}

export type FastifyApp = Awaited<ReturnType<typeof createApp>>;
