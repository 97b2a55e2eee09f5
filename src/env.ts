/**
 * Environment configuration with sensible defaults
 * All paths can be overridden via environment variables
 */
import { homedir } from "os";
import { join } from "path";

const HOME = homedir();

// Determine project directory (works whether running from src/ or dist/)
const PROJECT_DIR = join(__dirname, "..");

function parsePort(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === "") return defaultValue;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

export const env = {
  TODO_BOT_LOG_DIR: process.env.TODO_BOT_LOG_DIR || join(HOME, ".room-todo-bot", "logs"),
  TODO_BOT_LOG_LEVEL: process.env.TODO_BOT_LOG_LEVEL || "info",
  TODO_BOT_CONFIG: process.env.TODO_BOT_CONFIG || join(PROJECT_DIR, "config", "bot.json"),

  // Liveness probe port used by the hosting platform
  PORT: parsePort(process.env.PORT, 8080),
};
