/**
 * Fan-out dispatcher - deliver one message to many chats concurrently
 *
 * Each recipient gets its own attempt, bounded by a timeout. Failures are
 * collected as outcomes; dispatch() itself never rejects.
 */

import { type Logger, logger as defaultLogger } from "../lib/logger";
import { deliveriesTotal } from "../lib/prometheus";
import type { DeliveryOutcome, MessageSender } from "./types";

export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

export interface DispatcherOptions {
  sender: MessageSender;
  timeoutMs?: number;
  logger?: Logger;
}

export interface Dispatcher {
  /** One outcome per recipient id, in the order given. */
  dispatch(
    text: string,
    recipientIds: readonly number[],
  ): Promise<DeliveryOutcome[]>;
}

export function createDispatcher(opts: DispatcherOptions): Dispatcher {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
  const log = opts.logger ?? defaultLogger;

  async function deliver(
    recipientId: number,
    text: string,
  ): Promise<DeliveryOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Delivery timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      await Promise.race([
        opts.sender.sendMessage(recipientId, text, {
          parseMode: "MarkdownV2",
          signal: controller.signal,
        }),
        timeout,
      ]);
      deliveriesTotal.inc({ status: "sent" });
      return { recipientId, status: "sent" };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ recipientId, error: message }, "Delivery failed");
      deliveriesTotal.inc({ status: "error" });
      return { recipientId, status: "error", error: message };
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async dispatch(text, recipientIds) {
      const outcomes = await Promise.all(
        recipientIds.map((id) => deliver(id, text)),
      );

      log.debug(
        {
          recipients: recipientIds.length,
          failed: outcomes.filter((o) => o.status === "error").length,
        },
        "Dispatch complete",
      );

      return outcomes;
    },
  };
}
