import { existsSync, readFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import * as cron from "node-cron";
import { env } from "./env";
import { errorMessage, warn } from "./logger";
import { parseClockTime } from "./reminder-time";

export interface BotConfig {
  debug: boolean;
  logRetentionDays: number;
  maxTaskLength: number;
  /** "HH:MM" slots offered as reminder time buttons */
  reminderTimePresets: string[];
  dialogueIdleTimeoutMinutes: number;
  dialogueSweepCron: string;
  roomCodeMaxAttempts: number;
}

export const DEFAULT_CONFIG: BotConfig = {
  debug: false,
  logRetentionDays: 7,
  maxTaskLength: 1000,
  reminderTimePresets: ["09:00", "12:00", "18:00", "21:00"],
  dialogueIdleTimeoutMinutes: 30,
  dialogueSweepCron: "*/5 * * * *",
  roomCodeMaxAttempts: 50,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickBoolean(parsed: Record<string, unknown>, key: keyof BotConfig, fallback: boolean): boolean {
  const value = parsed[key];
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  warn("config", "invalid_value", { key, fallback });
  return fallback;
}

function pickInteger(parsed: Record<string, unknown>, key: keyof BotConfig, fallback: number, min: number): number {
  const value = parsed[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
  warn("config", "invalid_value", { key, fallback });
  return fallback;
}

function pickPresets(parsed: Record<string, unknown>, fallback: string[]): string[] {
  const value = parsed.reminderTimePresets;
  if (value === undefined) return fallback;
  if (Array.isArray(value) && value.length > 0) {
    const presets = value.filter((item): item is string => typeof item === "string" && parseClockTime(item) !== undefined);
    if (presets.length === value.length) return presets;
  }
  warn("config", "invalid_value", { key: "reminderTimePresets", fallback });
  return fallback;
}

function pickCron(parsed: Record<string, unknown>, fallback: string): string {
  const value = parsed.dialogueSweepCron;
  if (value === undefined) return fallback;
  if (typeof value === "string" && cron.validate(value)) return value;
  warn("config", "invalid_value", { key: "dialogueSweepCron", fallback });
  return fallback;
}

/** Merges a parsed JSON document over the defaults; invalid fields keep their default. */
export function resolveConfig(parsed: unknown): BotConfig {
  if (!isRecord(parsed)) {
    warn("config", "invalid_document", { reason: "expected a JSON object" });
    return { ...DEFAULT_CONFIG };
  }
  return {
    debug: pickBoolean(parsed, "debug", DEFAULT_CONFIG.debug),
    logRetentionDays: pickInteger(parsed, "logRetentionDays", DEFAULT_CONFIG.logRetentionDays, 1),
    maxTaskLength: pickInteger(parsed, "maxTaskLength", DEFAULT_CONFIG.maxTaskLength, 1),
    reminderTimePresets: pickPresets(parsed, DEFAULT_CONFIG.reminderTimePresets),
    dialogueIdleTimeoutMinutes: pickInteger(
      parsed,
      "dialogueIdleTimeoutMinutes",
      DEFAULT_CONFIG.dialogueIdleTimeoutMinutes,
      1
    ),
    dialogueSweepCron: pickCron(parsed, DEFAULT_CONFIG.dialogueSweepCron),
    roomCodeMaxAttempts: pickInteger(parsed, "roomCodeMaxAttempts", DEFAULT_CONFIG.roomCodeMaxAttempts, 1),
  };
}

export function loadConfig(configPath: string = env.TODO_BOT_CONFIG): BotConfig {
  if (!existsSync(configPath)) {
    // Create default config
    const configDir = dirname(configPath);
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true });
    }
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2));
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return resolveConfig(parsed);
  } catch (err) {
    warn("config", "load_failed", { path: configPath, error: errorMessage(err) });
    return { ...DEFAULT_CONFIG };
  }
}
