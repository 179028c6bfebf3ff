/**
 * Alert coordinator - gate, render and fan out one ingested alert
 */

import { type Logger, logger as defaultLogger } from "../lib/logger";
import { alertsIngestedTotal } from "../lib/prometheus";
import type { Dispatcher } from "./dispatcher";
import { renderAlert } from "./formatter";
import type { SubscriptionGate } from "./gate";
import type { Alert, ForwardResult } from "./types";

export const NO_RECIPIENTS_REASON = "no_subscribed_recipients";

export interface AlertCoordinatorDeps {
  gate: SubscriptionGate;
  dispatcher: Dispatcher;
  logger?: Logger;
}

export interface AlertCoordinator {
  forward(alert: Alert): Promise<ForwardResult>;
}

export function createAlertCoordinator(
  deps: AlertCoordinatorDeps,
): AlertCoordinator {
  const log = deps.logger ?? defaultLogger;

  return {
    async forward(alert) {
      const recipients = await deps.gate.eligibleRecipients();

      if (recipients.length === 0) {
        log.info(
          { summary: alert.summary },
          "No subscribed recipients, alert not forwarded",
        );
        alertsIngestedTotal.inc({ forwarded: "false" });
        return { forwarded: false, reason: NO_RECIPIENTS_REASON };
      }

      const text = renderAlert(alert);
      const results = await deps.dispatcher.dispatch(text, recipients);

      log.info(
        {
          summary: alert.summary,
          recipients: recipients.length,
          sent: results.filter((r) => r.status === "sent").length,
        },
        "Alert forwarded",
      );
      alertsIngestedTotal.inc({ forwarded: "true" });

      return { forwarded: true, results };
    },
  };
}
