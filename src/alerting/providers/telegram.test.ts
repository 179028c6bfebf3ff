import { describe, expect, test } from "vitest";
import { TelegramApiError } from "../../lib/errors";
import { createMockFetch } from "../../test-utils";
import { TelegramBotClient } from "./telegram";

const TOKEN = "test-token";

describe("TelegramBotClient", () => {
  test("sendMessage posts chat id, text and parse mode", async () => {
    const { fetchFn, requests } = createMockFetch([
      { status: 200, body: { ok: true, result: { message_id: 1 } } },
    ]);
    const client = new TelegramBotClient(TOKEN, { fetchFn });

    await client.sendMessage(42, "*hi*", { parseMode: "MarkdownV2" });

    expect(requests).toEqual([
      {
        url: "https://api.telegram.org/bottest-token/sendMessage",
        body: { chat_id: 42, text: "*hi*", parse_mode: "MarkdownV2" },
      },
    ]);
  });

  test("sendMessage surfaces the API description on failure", async () => {
    const { fetchFn } = createMockFetch([
      {
        status: 403,
        body: {
          ok: false,
          error_code: 403,
          description: "Forbidden: bot was blocked by the user",
        },
      },
    ]);
    const client = new TelegramBotClient(TOKEN, { fetchFn });

    const error = await client.sendMessage(42, "hi").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TelegramApiError);
    expect(error).toMatchObject({
      method: "sendMessage",
      status: 403,
      errorCode: 403,
      message:
        "Telegram API sendMessage failed (403): Forbidden: bot was blocked by the user",
    });
  });

  test("getUpdates sends the offset and keeps malformed updates as bare ids", async () => {
    const { fetchFn, requests } = createMockFetch([
      {
        status: 200,
        body: {
          ok: true,
          result: [
            {
              update_id: 10,
              message: {
                message_id: 1,
                chat: { id: 42, type: "private" },
                from: { id: 42, username: "alice" },
                text: "/start",
              },
            },
            { update_id: 11, message: { chat: "broken" } },
            { nonsense: true },
          ],
        },
      },
    ]);
    const client = new TelegramBotClient(TOKEN, {
      fetchFn,
      baseUrl: "http://telegram.test",
    });

    const updates = await client.getUpdates({ offset: 10, timeoutSeconds: 30 });

    expect(requests[0]).toEqual({
      url: "http://telegram.test/bottest-token/getUpdates",
      body: { offset: 10, timeout: 30, allowed_updates: ["message"] },
    });
    expect(updates).toEqual([
      {
        update_id: 10,
        message: {
          message_id: 1,
          chat: { id: 42, type: "private" },
          from: { id: 42, username: "alice" },
          text: "/start",
        },
      },
      { update_id: 11 },
    ]);
  });

  test("rejects responses that are not Bot API envelopes", async () => {
    const { fetchFn } = createMockFetch([{ status: 502, body: ["bad gateway"] }]);
    const client = new TelegramBotClient(TOKEN, { fetchFn });

    await expect(client.getMe()).rejects.toThrow(
      "Telegram API getMe failed (502): unexpected response shape",
    );
  });

  test("getMe returns the bot identity", async () => {
    const { fetchFn } = createMockFetch([
      {
        status: 200,
        body: { ok: true, result: { id: 1, is_bot: true, username: "soc_bot" } },
      },
    ]);
    const client = new TelegramBotClient(TOKEN, { fetchFn });

    expect(await client.getMe()).toEqual({ id: 1, is_bot: true, username: "soc_bot" });
  });

  test("deleteWebhook asks to drop pending updates", async () => {
    const { fetchFn, requests } = createMockFetch([
      { status: 200, body: { ok: true, result: true } },
    ]);
    const client = new TelegramBotClient(TOKEN, { fetchFn });

    await client.deleteWebhook(true);

    expect(requests[0]?.body).toEqual({ drop_pending_updates: true });
  });
});
