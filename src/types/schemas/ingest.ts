/**
 * Zod schemas for the alert ingest endpoint
 */

import { z } from "zod";

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Ingest request schema
 * Validates POST /v1/ingest
 *
 * Only the top level must be an object. Field values are coerced rather
 * than rejected: severity is normalised later by the renderer, and a
 * non-array `tags` is ignored.
 */
export const IngestRequestSchema = z.object({
  summary: z
    .unknown()
    .transform((v) => (v === undefined || v === null ? "Alert" : stringify(v))),
  severity: z.unknown(),
  details: z.unknown(),
  tags: z
    .unknown()
    .transform((v) => (Array.isArray(v) ? v.map(stringify) : undefined)),
});

export type IngestRequest = z.infer<typeof IngestRequestSchema>;

export const DeliveryResultSchema = z.object({
  recipient_id: z.number(),
  status: z.enum(["sent", "error"]),
  error: z.string().optional(),
});

export type DeliveryResult = z.infer<typeof DeliveryResultSchema>;

/**
 * Ingest response schema
 * 200 OK: accepted, with or without forwarding
 */
export const IngestResponseSchema = z.discriminatedUnion("forwarded", [
  z.object({
    accepted: z.literal(true),
    forwarded: z.literal(false),
    reason: z.string(),
  }),
  z.object({
    accepted: z.literal(true),
    forwarded: z.literal(true),
    results: z.array(DeliveryResultSchema),
  }),
]);

export type IngestResponse = z.infer<typeof IngestResponseSchema>;

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  issues: z
    .array(z.object({ path: z.string(), message: z.string() }))
    .optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
