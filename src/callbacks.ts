/**
 * Callback handlers for inline keyboard buttons
 */

import { CallbackQueryContext, Context } from "grammy";
import type { DialogueEngine } from "./dialogue-engine";
import { incrementMessages } from "./health";
import { debug, error } from "./logger";
import { replyThrough, sendReplies } from "./response-handler";

/** Every token the dialogue views put on an inline button. */
export const DIALOGUE_CALLBACK_PATTERN =
  /^(cancel|room_\d{4}|leave_\d{4}|delete_\d+|add_category_\w+|list_category_\w+|remind_(set|skip)|remind_date_(today|tomorrow)|remind_time_\d{4})$/;

async function answerQuietly(ctx: CallbackQueryContext<Context>): Promise<void> {
  try {
    await ctx.answerCallbackQuery();
  } catch (err) {
    debug("callbacks", "answer_failed", { error: err instanceof Error ? err.message : String(err) });
  }
}

/** Stops the button spinner, then hands the token to the engine. */
export function createDialogueCallbackHandler(
  engine: DialogueEngine
): (ctx: CallbackQueryContext<Context>) => Promise<void> {
  return async (ctx) => {
    await answerQuietly(ctx);
    const userId = ctx.callbackQuery.from.id.toString();
    incrementMessages();

    const replies = await engine.handleCallback(userId, ctx.callbackQuery.data);
    await sendReplies(replyThrough(ctx), replies);
  };
}

// Catch-all handler to prevent loading spinners on unknown callbacks
export async function handleUnknownCallback(ctx: Context): Promise<void> {
  try {
    await ctx.answerCallbackQuery({ text: "This button is no longer available." });
  } catch (err) {
    error("callbacks", "answer_failed", {
      data: ctx.callbackQuery?.data,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
