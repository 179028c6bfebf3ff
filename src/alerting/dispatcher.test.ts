import { describe, expect, test } from "vitest";
import { createSilentLogger, FakeSender } from "../test-utils";
import { createDispatcher } from "./dispatcher";

describe("createDispatcher", () => {
  test("isolates a failing recipient from the others", async () => {
    const sender = new FakeSender({ failing: [200] });
    const dispatcher = createDispatcher({ sender, logger: createSilentLogger() });

    const outcomes = await dispatcher.dispatch("hello", [100, 200, 300]);

    expect(outcomes).toEqual([
      { recipientId: 100, status: "sent" },
      {
        recipientId: 200,
        status: "error",
        error: "Forbidden: bot was blocked by the user",
      },
      { recipientId: 300, status: "sent" },
    ]);
    expect(sender.sent.map((m) => m.chatId)).toEqual([100, 300]);
  });

  test("sends the text as MarkdownV2", async () => {
    const sender = new FakeSender();
    const dispatcher = createDispatcher({ sender, logger: createSilentLogger() });

    await dispatcher.dispatch("*bold*", [100]);

    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0]?.text).toBe("*bold*");
    expect(sender.sent[0]?.options?.parseMode).toBe("MarkdownV2");
  });

  test("starts every attempt before any completes", async () => {
    const sender = new FakeSender({ hanging: [100, 200] });
    const dispatcher = createDispatcher({
      sender,
      timeoutMs: 20,
      logger: createSilentLogger(),
    });

    const pending = dispatcher.dispatch("hello", [100, 200]);
    expect(sender.attempts).toEqual([100, 200]);
    await pending;
  });

  test("turns a stalled attempt into a timeout error", async () => {
    const sender = new FakeSender({ hanging: [200] });
    const dispatcher = createDispatcher({
      sender,
      timeoutMs: 25,
      logger: createSilentLogger(),
    });

    const outcomes = await dispatcher.dispatch("hello", [100, 200]);

    expect(outcomes).toEqual([
      { recipientId: 100, status: "sent" },
      {
        recipientId: 200,
        status: "error",
        error: "Delivery timed out after 25ms",
      },
    ]);
  });

  test("reports non-Error rejections as strings", async () => {
    const dispatcher = createDispatcher({
      sender: {
        sendMessage: () => Promise.reject("chat not found"),
      },
      logger: createSilentLogger(),
    });

    expect(await dispatcher.dispatch("hello", [5])).toEqual([
      { recipientId: 5, status: "error", error: "chat not found" },
    ]);
  });

  test("returns no outcomes for no recipients", async () => {
    const sender = new FakeSender();
    const dispatcher = createDispatcher({ sender, logger: createSilentLogger() });

    expect(await dispatcher.dispatch("hello", [])).toEqual([]);
    expect(sender.attempts).toEqual([]);
  });
});
