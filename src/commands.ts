/**
 * Slash-command parsing and routing into the dialogue engine
 */

import { Context } from "grammy";
import type { DialogueEngine } from "./dialogue-engine";
import { info } from "./logger";
import { replyThrough, sendReplies } from "./response-handler";

// Shown when users type '/' in Telegram. Keep in sync with DialogueEngine.handleCommand.
export const BOT_COMMANDS = [
  { command: "start", description: "Welcome and main menu" },
  { command: "menu", description: "Show the main menu" },
  { command: "help", description: "Show all commands" },
  { command: "rooms", description: "Rooms you belong to" },
  { command: "add", description: "Add a personal todo" },
  { command: "list", description: "List personal todos" },
  { command: "done", description: "Complete a personal todo" },
  { command: "cancel", description: "Abandon the current step" },
  { command: "id", description: "Show your Telegram ID" },
] as const;

export interface ParsedCommand {
  command: string;
  args: string;
}

/** "/done@room_todo_bot 2" -> { command: "done", args: "2" } */
export function parseCommand(text: string): ParsedCommand | undefined {
  if (!text.startsWith("/")) return undefined;
  const parts = text.slice(1).split(" ");
  const commandToken = parts[0] || "";
  const command = commandToken.split("@")[0].toLowerCase();
  if (!command) return undefined;
  return { command, args: parts.slice(1).join(" ").trim() };
}

export async function handleCommand(
  ctx: Context,
  engine: DialogueEngine,
  userId: string,
  parsed: ParsedCommand
): Promise<void> {
  info("commands", "received", { userId, command: parsed.command });
  const replies = await engine.handleCommand(userId, parsed.command, parsed.args);
  await sendReplies(replyThrough(ctx), replies);
}
