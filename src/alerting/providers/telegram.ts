/**
 * Telegram Bot API client
 *
 * Talks to https://api.telegram.org/bot<token>/<method> with plain fetch.
 */

import { z } from "zod";
import { TelegramApiError } from "../../lib/errors";
import {
  TelegramEnvelopeSchema,
  type TelegramUpdate,
  TelegramUpdateSchema,
  type TelegramUser,
  TelegramUserSchema,
} from "../../types/schemas/telegram";
import type { MessageSender, SendMessageOptions } from "../types";

export const TELEGRAM_API_BASE = "https://api.telegram.org";

export interface TelegramClientOptions {
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

export interface GetUpdatesOptions {
  offset?: number;
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export class TelegramBotClient implements MessageSender {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly botToken: string,
    opts: TelegramClientOptions = {},
  ) {
    this.baseUrl = opts.baseUrl ?? TELEGRAM_API_BASE;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async sendMessage(
    chatId: number,
    text: string,
    options: SendMessageOptions = {},
  ): Promise<void> {
    await this.call(
      "sendMessage",
      {
        chat_id: chatId,
        text,
        parse_mode: options.parseMode,
      },
      options.signal,
    );
  }

  /**
   * Long-poll for new updates. Updates that do not match the expected shape
   * are dropped; their ids still advance the offset.
   */
  async getUpdates(opts: GetUpdatesOptions = {}): Promise<TelegramUpdate[]> {
    const result = await this.call(
      "getUpdates",
      {
        offset: opts.offset,
        timeout: opts.timeoutSeconds ?? 0,
        allowed_updates: ["message"],
      },
      opts.signal,
    );

    const raw = z.array(z.unknown()).safeParse(result);
    if (!raw.success) {
      throw new TelegramApiError("getUpdates", 200, "result is not an array");
    }

    const updates: TelegramUpdate[] = [];
    for (const item of raw.data) {
      const parsed = TelegramUpdateSchema.safeParse(item);
      if (parsed.success) {
        updates.push(parsed.data);
        continue;
      }
      const id = z.object({ update_id: z.number() }).safeParse(item);
      if (id.success) {
        updates.push({ update_id: id.data.update_id });
      }
    }
    return updates;
  }

  async deleteWebhook(dropPendingUpdates: boolean): Promise<void> {
    await this.call("deleteWebhook", {
      drop_pending_updates: dropPendingUpdates,
    });
  }

  async getMe(signal?: AbortSignal): Promise<TelegramUser> {
    const result = await this.call("getMe", {}, signal);
    const parsed = TelegramUserSchema.safeParse(result);
    if (!parsed.success) {
      throw new TelegramApiError("getMe", 200, "unexpected response shape");
    }
    return parsed.data;
  }

  private async call(
    method: string,
    params: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const response = await this.fetchFn(
      `${this.baseUrl}/bot${this.botToken}/${method}`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(params),
        signal,
      },
    );

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TelegramApiError(
        method,
        response.status,
        response.statusText || "non-JSON response",
      );
    }

    const envelope = TelegramEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TelegramApiError(
        method,
        response.status,
        "unexpected response shape",
      );
    }

    if (!response.ok || !envelope.data.ok) {
      throw new TelegramApiError(
        method,
        response.status,
        envelope.data.description || response.statusText || "request failed",
        envelope.data.error_code,
      );
    }

    return envelope.data.result;
  }
}
