/**
 * In-process stand-ins for the Telegram transport
 */

import type { MessageSender, SendMessageOptions } from "../../alerting/types";

export interface SentMessage {
  chatId: number;
  text: string;
  options?: SendMessageOptions;
}

/**
 * Records every message. Chats listed in `failing` reject with
 * `errorMessage`; chats listed in `hanging` never settle unless aborted.
 */
export class FakeSender implements MessageSender {
  readonly sent: SentMessage[] = [];
  readonly attempts: number[] = [];

  constructor(
    private readonly behaviour: {
      failing?: number[];
      hanging?: number[];
      errorMessage?: string;
    } = {},
  ) {}

  async sendMessage(
    chatId: number,
    text: string,
    options?: SendMessageOptions,
  ): Promise<void> {
    this.attempts.push(chatId);

    if (this.behaviour.hanging?.includes(chatId)) {
      await new Promise<void>((_resolve, reject) => {
        options?.signal?.addEventListener("abort", () =>
          reject(new Error("aborted")),
        );
      });
    }

    if (this.behaviour.failing?.includes(chatId)) {
      throw new Error(this.behaviour.errorMessage ?? "Forbidden: bot was blocked by the user");
    }

    this.sent.push({ chatId, text, options });
  }
}

export interface RecordedRequest {
  url: string;
  body: unknown;
}

/**
 * Builds a fetch replacement that answers with the given status and JSON
 * bodies in order (the last one repeats) and records each request.
 */
export function createMockFetch(
  responses: Array<{ status: number; body: unknown }>,
): { fetchFn: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  let callCount = 0;

  const fetchFn: typeof fetch = async (input, init) => {
    const response = responses[Math.min(callCount, responses.length - 1)];
    callCount++;
    if (!response) {
      throw new Error("No mock response configured");
    }

    requests.push({
      url: String(input),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });

    return new Response(JSON.stringify(response.body), {
      status: response.status,
      headers: { "Content-Type": "application/json" },
    });
  };

  return { fetchFn, requests };
}
