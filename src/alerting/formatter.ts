/**
 * Alert message rendering for Telegram MarkdownV2
 *
 * Only user-supplied fragments go through escapeMarkdown. Template text
 * below is written already escaped, and the details JSON sits inside a
 * code block where markup is not interpreted.
 */

import type { Alert } from "./types";

export const SEVERITY_ICONS = [
  "🟢",
  "🟢",
  "🟢",
  "🟡",
  "🟡",
  "🟡",
  "🟠",
  "🟠",
  "🔴",
  "🔴",
  "🔥",
] as const;

export const DEFAULT_SEVERITY = 5;
export const MIN_SEVERITY = 0;
export const MAX_SEVERITY = 10;

/** Telegram rejects messages longer than this */
export const MAX_MESSAGE_LENGTH = 4096;
export const MAX_SUMMARY_LENGTH = 1024;
export const MAX_TAGS = 10;
export const MAX_TAG_LENGTH = 48;
export const TRUNCATION_MARKER = "\n… (truncated)";

const RESERVED_CHARS = /[\\_*[\]()~`>#+\-=|{}.!]/g;

/**
 * Prefix every MarkdownV2 reserved character with a backslash.
 * Apply to dynamic fragments only, never to a whole composed message.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(RESERVED_CHARS, (ch) => `\\${ch}`);
}

/**
 * Coerce a submitted severity to an integer in [0, 10].
 * Anything that is not a finite number or numeric string counts as 5.
 */
export function normalizeSeverity(value: unknown): number {
  let severity = DEFAULT_SEVERITY;

  if (typeof value === "number" && Number.isFinite(value)) {
    severity = Math.trunc(value);
  } else if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      severity = Math.trunc(parsed);
    }
  }

  return Math.max(MIN_SEVERITY, Math.min(MAX_SEVERITY, severity));
}

export function severityIcon(severity: unknown): string {
  return SEVERITY_ICONS[normalizeSeverity(severity)] ?? SEVERITY_ICONS[DEFAULT_SEVERITY];
}

/**
 * First `end` UTF-16 units of `text`, minus a trailing high surrogate so a
 * cut never leaves half of an emoji behind.
 */
function sliceWhole(text: string, end: number): string {
  const cut = text.slice(0, end);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${sliceWhole(text, max - 1)}…` : text;
}

function prettyJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Render an alert as `<icon> *<summary>*`, then an optional line of
 * `#tag` tokens, then an optional `Details:` JSON code block. The result
 * never exceeds MAX_MESSAGE_LENGTH; oversized details are cut.
 */
export function renderAlert(alert: Alert): string {
  const icon = severityIcon(alert.severity);
  let text = `${icon} *${escapeMarkdown(truncate(alert.summary, MAX_SUMMARY_LENGTH))}*`;

  const tags = (alert.tags ?? []).slice(0, MAX_TAGS);
  if (tags.length > 0) {
    const tagLine = tags
      .map((tag) => `\\#${escapeMarkdown(truncate(tag, MAX_TAG_LENGTH))}`)
      .join(" ");
    text += `\n${tagLine}`;
  }

  if (alert.details !== undefined && alert.details !== null) {
    const open = "\n*Details:*\n```json\n";
    const close = "\n```";
    let pretty = prettyJson(alert.details);

    const budget = MAX_MESSAGE_LENGTH - text.length - open.length - close.length;
    if (pretty.length > budget) {
      pretty =
        sliceWhole(pretty, Math.max(0, budget - TRUNCATION_MARKER.length)) +
        TRUNCATION_MARKER;
    }

    text += `${open}${pretty}${close}`;
  }

  return text;
}
