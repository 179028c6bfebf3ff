/**
 * Core types for alert relaying
 */

/**
 * An alert as submitted by an upstream tool. Exists only for the duration
 * of one ingest-and-dispatch call.
 */
export interface Alert {
  summary: string;
  /** Raw severity as submitted; normalised and clamped by the renderer */
  severity?: unknown;
  details?: unknown;
  tags?: string[];
}

export type DeliveryOutcome =
  | { recipientId: number; status: "sent" }
  | { recipientId: number; status: "error"; error: string };

export interface SendMessageOptions {
  parseMode?: "MarkdownV2";
  signal?: AbortSignal;
}

/**
 * Transport used by the dispatcher. Rejects when the message was not
 * accepted for the given chat.
 */
export interface MessageSender {
  sendMessage(
    chatId: number,
    text: string,
    options?: SendMessageOptions,
  ): Promise<void>;
}

export type ForwardResult =
  | { forwarded: false; reason: string }
  | { forwarded: true; results: DeliveryOutcome[] };
