/**
 * Subscription gate - per-recipient opt-in
 *
 * A recipient is eligible for forwarded alerts only while its own
 * `subscribed` flag is set (/receive_alert). There is no global switch.
 */

import type { RegistryStore } from "../registry/store";

export interface SubscriptionGate {
  /** Ids of subscribed recipients, in registry order. May be empty. */
  eligibleRecipients(): Promise<number[]>;
}

export function createSubscriptionGate(
  store: Pick<RegistryStore, "list">,
): SubscriptionGate {
  return {
    async eligibleRecipients() {
      const recipients = await store.list();
      return recipients.filter((r) => r.subscribed).map((r) => r.id);
    },
  };
}
