/**
 * Chat command handlers
 *
 * Handlers only return replies; the poller delivers them to the issuing
 * chat. Replies flagged MarkdownV2 are composed from pre-escaped template
 * text plus escaped user fragments.
 */

import type { Dispatcher } from "../alerting/dispatcher";
import { escapeMarkdown, renderAlert } from "../alerting/formatter";
import type { DeliveryOutcome } from "../alerting/types";
import { type Logger, logger as defaultLogger } from "../lib/logger";
import { commandsTotal } from "../lib/prometheus";
import type { RegistryStore } from "../registry/store";

export interface CommandContext {
  /** Chat the command was sent in; replies and registration use it */
  chatId: number;
  /** User who sent the command, checked against SUPER_ADMIN_IDS */
  userId: number | null;
  username: string | null;
  /** Text after the command name, trimmed */
  args: string;
}

export interface CommandReply {
  text: string;
  parseMode?: "MarkdownV2";
}

export type CommandHandler = (ctx: CommandContext) => Promise<CommandReply[]>;

export interface CommandDeps {
  store: RegistryStore;
  dispatcher: Dispatcher;
  superAdminIds: ReadonlySet<number>;
  logger?: Logger;
}

export const HELP_TEXT = [
  "🛡️ *SOC Bot Commands:*",
  "",
  "/start \\- Register yourself to receive SOC alerts\\.",
  "/stop \\- Unregister from receiving SOC alerts\\.",
  "/admins \\- List all registered admins\\.",
  "/receive\\_alert \\- ENABLE continuous forwarding of suspicious alerts to you\\.",
  "/stop\\_receive \\- DISABLE continuous forwarding of suspicious alerts to you\\.",
  "/testalert \\- Send a test alert to all admins\\.",
  "/broadcast <msg\\> \\- Send a custom message to all other admins\\.",
  "/show\\_state \\- Show the receive mode of every admin\\.",
  "/help \\- Show this message\\.",
].join("\n");

export const GENERIC_FAILURE_REPLY = "⚠️ Something went wrong, please try again.";

const TEST_ALERT = {
  summary: "Test alert from SOC Bot",
  severity: 6,
  details: { demo: true },
  tags: ["TEST"],
};

function plain(text: string): CommandReply {
  return { text };
}

function markdown(text: string): CommandReply {
  return { text, parseMode: "MarkdownV2" };
}

function deliverySummary(outcomes: DeliveryOutcome[]): string {
  const failed = outcomes.filter((o) => o.status === "error").length;
  return `${outcomes.length - failed} delivered, ${failed} failed`;
}

export function createCommandHandlers(
  deps: CommandDeps,
): Record<string, CommandHandler> {
  const { store, dispatcher, superAdminIds } = deps;

  async function isRegistered(chatId: number): Promise<boolean> {
    return (await store.get(chatId)) !== undefined;
  }

  async function isAuthorised(ctx: CommandContext): Promise<boolean> {
    if (ctx.userId !== null && superAdminIds.has(ctx.userId)) {
      return true;
    }
    return isRegistered(ctx.chatId);
  }

  async function toggleReceive(
    ctx: CommandContext,
    enable: boolean,
  ): Promise<CommandReply[]> {
    const change = await store.changeSubscription(ctx.chatId, enable);
    if (change === "not_found") {
      return [
        plain(
          `❌ Only registered admins can ${enable ? "enable" : "disable"} receive mode.`,
        ),
      ];
    }
    if (change === "unchanged") {
      return [
        plain(`⚠️ Receive mode already ${enable ? "ENABLED" : "DISABLED"}.`),
      ];
    }

    return [
      plain(
        enable
          ? "✅ You will now receive incoming suspicious alerts.\nUse /stop_receive to disable."
          : "🛑 You will no longer receive alerts.",
      ),
    ];
  }

  return {
    async start(ctx) {
      const added = await store.add(ctx.chatId, ctx.username);
      if (!added) {
        return [plain("ℹ️ Already registered.")];
      }
      return [
        plain(`✅ Registered ${ctx.username ?? ctx.chatId}.`),
        markdown(HELP_TEXT),
      ];
    },

    async stop(ctx) {
      const removed = await store.remove(ctx.chatId);
      return [plain(removed ? "🛑 Removed." : "ℹ️ You were not registered.")];
    },

    async admins(ctx) {
      if (!(await isAuthorised(ctx))) {
        return [plain("❌ Only registered admins can list admins.")];
      }
      const recipients = await store.list();
      if (recipients.length === 0) {
        return [plain("No admins registered yet.")];
      }
      const lines = recipients.map(
        (r) => `• ${escapeMarkdown(r.displayName ?? "unknown")} — \`${r.id}\``,
      );
      return [markdown(`👥 *Registered Admins:*\n${lines.join("\n")}`)];
    },

    async receive_alert(ctx) {
      return toggleReceive(ctx, true);
    },

    async stop_receive(ctx) {
      return toggleReceive(ctx, false);
    },

    async testalert(ctx) {
      if (!(await isAuthorised(ctx))) {
        return [plain("❌ Only registered admins can send alert.")];
      }
      const targets = (await store.list()).map((r) => r.id);
      if (targets.length === 0) {
        return [plain("No recipients registered yet.")];
      }
      const outcomes = await dispatcher.dispatch(renderAlert(TEST_ALERT), targets);
      return [plain(`✅ Test alert sent: ${deliverySummary(outcomes)}.`)];
    },

    async broadcast(ctx) {
      if (!(await isAuthorised(ctx))) {
        return [plain("❌ Only registered admins can broadcast.")];
      }
      if (!ctx.args) {
        return [plain("⚠️ Usage: /broadcast <message>")];
      }
      const targets = (await store.list())
        .map((r) => r.id)
        .filter((id) => id !== ctx.chatId);
      if (targets.length === 0) {
        return [plain("ℹ️ No other admins to broadcast to.")];
      }

      const sender = escapeMarkdown(ctx.username ?? String(ctx.chatId));
      const text = `📢 *Broadcast from ${sender}:*\n${escapeMarkdown(ctx.args)}`;
      const outcomes = await dispatcher.dispatch(text, targets);
      return [plain(`✅ Broadcast sent: ${deliverySummary(outcomes)}.`)];
    },

    async show_state(ctx) {
      if (!(await isAuthorised(ctx))) {
        return [plain("❌ Only registered admins can view the state.")];
      }
      const recipients = await store.list();
      if (recipients.length === 0) {
        return [plain("No admins registered yet.")];
      }
      const lines = recipients.map(
        (r) =>
          `• ${escapeMarkdown(r.displayName ?? "unknown")} — \`${r.id}\` — ${r.subscribed ? "✅ ON" : "❌ OFF"}`,
      );
      return [markdown(`📊 *Current State:*\n\n${lines.join("\n")}`)];
    },

    async help() {
      return [markdown(HELP_TEXT)];
    },
  };
}

export interface CommandRouter {
  /** Replies for a known command, or null when the command is unknown. */
  handle(name: string, ctx: CommandContext): Promise<CommandReply[] | null>;
}

export function createCommandRouter(deps: CommandDeps): CommandRouter {
  const handlers = createCommandHandlers(deps);
  const log = deps.logger ?? defaultLogger;

  return {
    async handle(name, ctx) {
      if (!Object.hasOwn(handlers, name)) {
        return null;
      }
      const handler = handlers[name];
      commandsTotal.inc({ command: name });

      try {
        return await handler(ctx);
      } catch (error) {
        log.error({ command: name, chatId: ctx.chatId, error }, "Command failed");
        return [plain(GENERIC_FAILURE_REPLY)];
      }
    },
  };
}
