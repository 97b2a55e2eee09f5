/**
 * Telegram transport: bot construction, inbound routing and polling lifecycle
 */

import { Bot, Context } from "grammy";
import { createDialogueCallbackHandler, DIALOGUE_CALLBACK_PATTERN, handleUnknownCallback } from "./callbacks";
import { BOT_COMMANDS, handleCommand, parseCommand } from "./commands";
import type { DialogueEngine } from "./dialogue-engine";
import { incrementErrors, incrementMessages } from "./health";
import { debug, error, info } from "./logger";
import { clipForTelegram, replyThrough, sendReplies, sendTypingIndicator } from "./response-handler";
import type { MessageSink } from "./types";

/** The one Bot API call the sink needs; grammy's `Api` satisfies it. */
export interface TextSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

/** Outbound side used by fanout and reminders: one private chat per user id. */
export class TelegramMessageSink implements MessageSink {
  constructor(private readonly api: TextSender) {}

  async sendMessage(userId: string, text: string): Promise<void> {
    await this.api.sendMessage(userId, clipForTelegram(text));
  }
}

function createTextHandler(engine: DialogueEngine): (ctx: Context) => Promise<void> {
  return async (ctx) => {
    const userId = ctx.from?.id?.toString();
    const messageText = ctx.message?.text;
    if (!userId || !messageText) {
      return;
    }
    incrementMessages();

    const parsed = parseCommand(messageText);
    if (parsed) {
      await handleCommand(ctx, engine, userId, parsed);
      return;
    }

    debug("poller", "text_received", { userId, length: messageText.length });
    await sendTypingIndicator(ctx);
    const replies = await engine.handleText(userId, messageText);
    await sendReplies(replyThrough(ctx), replies);
  };
}

/** Counts and logs an error that escaped a handler; polling continues. */
export function reportBotError(cause: unknown, chatId?: number): void {
  incrementErrors();
  error("poller", "bot_error", {
    error: cause instanceof Error ? cause.message : String(cause),
    chatId,
  });
}

export async function createBot(token: string, options?: { skipSetMyCommands?: boolean }): Promise<Bot> {
  const bot = new Bot(token);

  if (!options?.skipSetMyCommands) {
    await bot.api.setMyCommands(BOT_COMMANDS);
    await bot.api.setMyCommands(BOT_COMMANDS, {
      scope: { type: "all_private_chats" },
    });
    await bot.api.setMyDescription(
      "Shared todo lists for password-protected rooms, with one-shot reminders."
    );
    await bot.api.setChatMenuButton({
      menu_button: { type: "commands" },
    });
  }

  bot.catch((err) => reportBotError(err.error || err, err.ctx?.chat?.id));

  return bot;
}

export function registerDialogueHandlers(bot: Bot, engine: DialogueEngine): void {
  bot.callbackQuery(DIALOGUE_CALLBACK_PATTERN, createDialogueCallbackHandler(engine));
  bot.on("callback_query:data", handleUnknownCallback);
  bot.on("message:text", createTextHandler(engine));
}

export async function startPolling(bot: Bot): Promise<void> {
  info("poller", "starting_polling");

  // Infinite retry with exponential backoff capped at 5 minutes
  let retryCount = 0;
  const baseDelay = 1000;
  const maxDelay = 300000;

  while (true) {
    try {
      await bot.start({
        onStart: (botInfo) => {
          info("poller", "bot_started", { username: botInfo.username });
          retryCount = 0;
        },
      });
      break;
    } catch (err) {
      retryCount++;
      const errMsg = err instanceof Error ? err.message : String(err);

      // Check for fatal errors that shouldn't be retried
      if (errMsg.includes("401") || errMsg.includes("Unauthorized")) {
        error("poller", "fatal_auth_error", { error: errMsg });
        throw new Error("Bot token is invalid or revoked. Cannot start polling.");
      }

      error("poller", "start_failed", {
        attempt: retryCount,
        error: errMsg,
      });

      // Exponential backoff with jitter, capped at maxDelay
      const jitter = Math.random() * 1000;
      const delay = Math.min(baseDelay * Math.pow(2, retryCount - 1) + jitter, maxDelay);
      info("poller", "retrying", { delayMs: Math.round(delay), attempt: retryCount });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
