/**
 * Telegram long-polling loop
 *
 * Pulls updates with getUpdates, routes slash commands to the command
 * router and sends the replies back to the issuing chat.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { TelegramBotClient } from "../alerting/providers/telegram";
import { type Logger, logger as defaultLogger } from "../lib/logger";
import type { TelegramUpdate } from "../types/schemas/telegram";
import type { CommandRouter } from "./commands";

export const DEFAULT_POLL_TIMEOUT_SECONDS = 30;
export const DEFAULT_RETRY_DELAY_MS = 5_000;

export interface ParsedCommand {
  name: string;
  args: string;
}

/**
 * Split `/name@bot rest of text` into a lower-cased name and trimmed args
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) {
    return null;
  }
  return {
    name: match[1].toLowerCase(),
    args: (match[2] ?? "").trim(),
  };
}

export interface CommandPollerOptions {
  client: Pick<TelegramBotClient, "getUpdates" | "deleteWebhook" | "sendMessage">;
  router: CommandRouter;
  pollTimeoutSeconds?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

export class CommandPoller {
  private offset: number | undefined;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly opts: CommandPollerOptions) {
    this.pollTimeoutSeconds =
      opts.pollTimeoutSeconds ?? DEFAULT_POLL_TIMEOUT_SECONDS;
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = opts.logger ?? defaultLogger;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Offset that the next getUpdates call will acknowledge from */
  get nextOffset(): number | undefined {
    return this.offset;
  }

  /**
   * Drop updates queued while the bot was offline, then start polling.
   * Resolves once the loop is running.
   */
  async start(): Promise<void> {
    if (this.loop) {
      return;
    }
    await this.opts.client.deleteWebhook(true);

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      this.logger.error({ error }, "Command poller exited unexpectedly");
    });
    this.logger.info(
      { pollTimeoutSeconds: this.pollTimeoutSeconds },
      "Command poller started",
    );
  }

  /** Abort the in-flight poll and wait for the loop to exit */
  async stop(): Promise<void> {
    if (!this.controller || !this.loop) {
      return;
    }
    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    this.logger.info("Command poller stopped");
  }

  /**
   * Handle one batch of updates and advance the offset past the highest
   * update id. Chats are handled concurrently; updates from the same chat
   * run one after another in arrival order.
   */
  async handleUpdates(updates: TelegramUpdate[]): Promise<void> {
    const byChat = new Map<number, TelegramUpdate[]>();
    for (const update of updates) {
      if (this.offset === undefined || update.update_id >= this.offset) {
        this.offset = update.update_id + 1;
      }
      const chatId = update.message?.chat.id;
      if (chatId === undefined) {
        continue;
      }
      const queue = byChat.get(chatId);
      if (queue) {
        queue.push(update);
      } else {
        byChat.set(chatId, [update]);
      }
    }

    await Promise.all(
      [...byChat.values()].map(async (queue) => {
        for (const update of queue) {
          await this.handleUpdate(update);
        }
      }),
    );
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const updates = await this.opts.client.getUpdates({
          offset: this.offset,
          timeoutSeconds: this.pollTimeoutSeconds,
          signal,
        });
        await this.handleUpdates(updates);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.logger.error(
          { error, retryInMs: this.retryDelayMs },
          "Polling for updates failed",
        );
        await sleep(this.retryDelayMs, undefined, { signal }).catch(
          (sleepError: unknown) => {
            if (!signal.aborted) {
              throw sleepError;
            }
          },
        );
      }
    }
  }

  private async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (!message?.text) {
      return;
    }
    const command = parseCommand(message.text);
    if (!command) {
      return;
    }

    const chatId = message.chat.id;
    try {
      const replies = await this.opts.router.handle(command.name, {
        chatId,
        userId: message.from?.id ?? null,
        username: message.from?.username ?? null,
        args: command.args,
      });
      if (!replies) {
        this.logger.debug({ chatId, command: command.name }, "Unknown command ignored");
        return;
      }

      for (const reply of replies) {
        await this.opts.client.sendMessage(chatId, reply.text, {
          parseMode: reply.parseMode,
        });
      }
    } catch (error) {
      this.logger.error(
        { chatId, command: command.name, error },
        "Failed to answer command",
      );
    }
  }
}
