import { describe, expect, test } from "vitest";
import { createAlert, createSilentLogger, FakeSender } from "../test-utils";
import type { Recipient } from "../types/schemas/registry";
import { createAlertCoordinator, NO_RECIPIENTS_REASON } from "./coordinator";
import { createDispatcher } from "./dispatcher";
import { renderAlert } from "./formatter";
import { createSubscriptionGate } from "./gate";

function storeOf(recipients: Recipient[]) {
  return { list: async () => recipients };
}

describe("createSubscriptionGate", () => {
  test("returns only subscribed recipients in registry order", async () => {
    const gate = createSubscriptionGate(
      storeOf([
        { id: 300, displayName: null, subscribed: true },
        { id: 100, displayName: "alice", subscribed: false },
        { id: 200, displayName: "bob", subscribed: true },
      ]),
    );

    expect(await gate.eligibleRecipients()).toEqual([300, 200]);
  });

  test("returns an empty list when nobody is subscribed", async () => {
    const gate = createSubscriptionGate(
      storeOf([{ id: 100, displayName: "alice", subscribed: false }]),
    );

    expect(await gate.eligibleRecipients()).toEqual([]);
  });
});

describe("createAlertCoordinator", () => {
  const logger = createSilentLogger();

  test("does not forward when no recipient is subscribed", async () => {
    const sender = new FakeSender();
    const coordinator = createAlertCoordinator({
      gate: createSubscriptionGate(
        storeOf([{ id: 100, displayName: "alice", subscribed: false }]),
      ),
      dispatcher: createDispatcher({ sender, logger }),
      logger,
    });

    const result = await coordinator.forward(createAlert());

    expect(result).toEqual({ forwarded: false, reason: NO_RECIPIENTS_REASON });
    expect(sender.attempts).toEqual([]);
  });

  test("renders once and sends to every subscribed recipient", async () => {
    const sender = new FakeSender({ failing: [300] });
    const coordinator = createAlertCoordinator({
      gate: createSubscriptionGate(
        storeOf([
          { id: 100, displayName: "alice", subscribed: true },
          { id: 200, displayName: "bob", subscribed: false },
          { id: 300, displayName: null, subscribed: true },
        ]),
      ),
      dispatcher: createDispatcher({ sender, logger }),
      logger,
    });
    const alert = createAlert({ tags: ["ssh"] });

    const result = await coordinator.forward(alert);

    expect(result).toEqual({
      forwarded: true,
      results: [
        { recipientId: 100, status: "sent" },
        {
          recipientId: 300,
          status: "error",
          error: "Forbidden: bot was blocked by the user",
        },
      ],
    });
    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0]?.text).toBe(renderAlert(alert));
  });
});
