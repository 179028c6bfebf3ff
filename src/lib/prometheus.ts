/**
 * Prometheus metrics export
 */

import { Counter, collectDefaultMetrics, Registry } from "prom-client";

const registry = new Registry();

// Collect default Node.js metrics (CPU, memory, etc.)
collectDefaultMetrics({ register: registry });

/**
 * Alerts accepted on the ingest endpoint, split by whether any recipient
 * was eligible
 */
export const alertsIngestedTotal = new Counter({
  name: "soc_relay_alerts_ingested_total",
  help: "Total number of alerts accepted by the ingest endpoint",
  labelNames: ["forwarded"] as const,
  registers: [registry],
});

export const ingestRejectedTotal = new Counter({
  name: "soc_relay_ingest_rejected_total",
  help: "Total number of ingest requests rejected before dispatch",
  labelNames: ["reason"] as const,
  registers: [registry],
});

/**
 * One increment per recipient delivery attempt
 */
export const deliveriesTotal = new Counter({
  name: "soc_relay_deliveries_total",
  help: "Total number of per-recipient delivery attempts",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const commandsTotal = new Counter({
  name: "soc_relay_commands_total",
  help: "Total number of chat commands handled",
  labelNames: ["command"] as const,
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

export { registry };
