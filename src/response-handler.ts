/**
 * Renders dialogue replies into Telegram messages and keyboards
 */

import { Context, InlineKeyboard, Keyboard } from "grammy";
import type { KeyboardSpec, Reply } from "./dialogue-views";
import { debug } from "./logger";

export const MAX_MESSAGE_LENGTH = 4096;

export type ReplyMarkup = InlineKeyboard | Keyboard;

/** Sends one plain-text message; the markup is attached when present. */
export type SendText = (text: string, markup?: ReplyMarkup) => Promise<unknown>;

export function clipForTelegram(text: string): string {
  if (text.length <= MAX_MESSAGE_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_MESSAGE_LENGTH - 3)}...`;
}

export function buildReplyMarkup(spec: KeyboardSpec): ReplyMarkup {
  if (spec.kind === "inline") {
    const keyboard = new InlineKeyboard();
    spec.rows.forEach((row, index) => {
      if (index > 0) keyboard.row();
      for (const button of row) {
        keyboard.text(button.label, button.token);
      }
    });
    return keyboard;
  }

  const keyboard = new Keyboard();
  spec.rows.forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const label of row) {
      keyboard.text(label);
    }
  });
  return keyboard.resized().persistent().placeholder("Pick an action or type a reply");
}

/** Sends replies in order; the next one waits for the previous send. */
export async function sendReplies(send: SendText, replies: Reply[]): Promise<void> {
  for (const reply of replies) {
    const markup = reply.keyboard ? buildReplyMarkup(reply.keyboard) : undefined;
    await send(clipForTelegram(reply.text), markup);
  }
  debug("response", "replies_sent", { count: replies.length });
}

export function replyThrough(ctx: Context): SendText {
  return (text, markup) => ctx.reply(text, markup ? { reply_markup: markup } : undefined);
}

/**
 * Send typing indicator
 */
export async function sendTypingIndicator(ctx: Context): Promise<void> {
  try {
    await ctx.replyWithChatAction("typing");
  } catch (err) {
    debug("response", "typing_indicator_failed", { error: err instanceof Error ? err.message : String(err) });
  }
}
