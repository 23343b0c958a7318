/**
 * Telegram delivery for run summaries. Fire-and-forget: failures are
 * logged and recorded, never thrown back into a run.
 */

import { logger } from "../logger";
import { errorMessage } from "../errors";
import { logNotification } from "../db/operations";
import type { Database } from "../db";

export type Notifier = (recipientId: string, text: string) => Promise<boolean>;

interface TelegramSendResult {
  ok: boolean;
  result?: {
    message_id: number;
  };
  description?: string;
}

const TELEGRAM_API = "https://api.telegram.org";
const MAX_MESSAGE_LENGTH = 4000;

export function splitMessage(text: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    // Hard-split lines Telegram would reject outright
    if (line.length > maxLength) {
      if (current) {
        chunks.push(current.trim());
        current = "";
      }
      let remaining = line;
      while (remaining.length > maxLength) {
        chunks.push(remaining.substring(0, maxLength));
        remaining = remaining.substring(maxLength);
      }
      current = remaining;
      continue;
    }

    if (current.length + line.length + 1 > maxLength) {
      if (current) chunks.push(current.trim());
      current = line;
    } else {
      current += (current ? "\n" : "") + line;
    }
  }
  if (current) chunks.push(current.trim());

  return chunks;
}

async function sendChunk(botToken: string, chatId: string, text: string): Promise<void> {
  const response = await fetch(`${TELEGRAM_API}/bot${botToken}/sendMessage`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      chat_id: chatId,
      text,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    }),
  });

  const result = (await response.json()) as TelegramSendResult;
  if (!result.ok) {
    throw new Error(result.description ?? `Telegram API error (${response.status})`);
  }
}

export function createTelegramNotifier(options: {
  botToken: string;
  dryRun: boolean;
  db?: Database;
}): Notifier {
  const record = (recipient: string, text: string, status: "sent" | "failed" | "dry_run", error?: string) => {
    if (!options.db) return;
    try {
      logNotification(options.db, recipient, text, status, error ?? null);
    } catch (logError) {
      logger.warn(`Telegram: could not record notification: ${errorMessage(logError)}`);
    }
  };

  return async (recipientId, text) => {
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would send to ${recipientId}:`);
      logger.info(text.substring(0, 200) + (text.length > 200 ? "..." : ""));
      record(recipientId, text, "dry_run");
      return true;
    }

    if (!options.botToken) {
      logger.warn("Telegram bot not configured — skipping notification");
      return false;
    }

    try {
      for (const chunk of splitMessage(text)) {
        await sendChunk(options.botToken, recipientId, chunk);
      }
      record(recipientId, text, "sent");
      return true;
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Telegram send to ${recipientId} failed: ${message}`);
      record(recipientId, text, "failed", message);
      return false;
    }
  };
}

export { escapeHtml, formatScoutSummary, formatPoolSummary } from "./digest";
export type { PromotedLine } from "./digest";
