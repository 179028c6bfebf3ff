/**
 * Alert and registry fixtures
 */

import type { Alert } from "../../alerting/types";
import type { RegistrySnapshot } from "../../types/schemas/registry";

export function createAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    summary: "Brute force detected on web-1",
    severity: 7,
    ...overrides,
  };
}

export function createSnapshot(
  recipients: RegistrySnapshot["recipients"] = [
    { id: 100, displayName: "alice", subscribed: true },
    { id: 200, displayName: "bob", subscribed: false },
    { id: 300, displayName: null, subscribed: true },
  ],
): RegistrySnapshot {
  return { recipients };
}
