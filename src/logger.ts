import { existsSync, mkdirSync, appendFileSync, readdirSync, unlinkSync, statSync } from "fs";
import { join } from "path";
import { env } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  event: string;
  data?: Record<string, unknown>;
}

interface LoggerConfig {
  debug: boolean;
  logRetentionDays: number;
}

const LOG_DIR = env.TODO_BOT_LOG_DIR;
const LOG_CLEANUP_INTERVAL_MS = 6 * 60 * 60 * 1000; // 6 hours

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseConsoleThreshold(value: string): number {
  const normalized = value.trim().toLowerCase();
  if (normalized === "silent") return Number.POSITIVE_INFINITY;
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return LEVEL_ORDER[normalized];
  }
  return LEVEL_ORDER.info;
}

const consoleThreshold = parseConsoleThreshold(env.TODO_BOT_LOG_LEVEL);

let config: LoggerConfig = {
  debug: false,
  logRetentionDays: 7,
};

// Files are only written once initLogger() has run; before that (and in tests) console only.
let fileOutputEnabled = false;
let logDirEnsured = false;
let logCleanupInterval: NodeJS.Timeout | null = null;

const writeBuffers: Map<string, string[]> = new Map();
const FLUSH_INTERVAL_MS = 2000;
const MAX_BUFFER_LINES = 50;
let flushInterval: NodeJS.Timeout | null = null;

function getOrCreateBuffer(path: string): string[] {
  let buf = writeBuffers.get(path);
  if (!buf) {
    buf = [];
    writeBuffers.set(path, buf);
  }
  return buf;
}

function ensureLogDir(): void {
  if (logDirEnsured) return;
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
  logDirEnsured = true;
}

function appendLines(path: string, lines: string[]): void {
  try {
    ensureLogDir();
    appendFileSync(path, lines.join("\n") + "\n");
  } catch (err) {
    console.error(`[logger] write to ${path} failed: ${errorMessage(err)}`);
  }
}

function flushAllBuffers(): void {
  for (const [path, lines] of writeBuffers.entries()) {
    if (lines.length === 0) continue;
    appendLines(path, lines);
    lines.length = 0;
  }
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

function getLogPath(type: "bot" | "error" | "debug"): string {
  return join(LOG_DIR, `${type}.${getDateString()}.log`);
}

function writeToFile(path: string, entry: LogEntry): void {
  const buf = getOrCreateBuffer(path);
  buf.push(JSON.stringify(entry));
  if (buf.length >= MAX_BUFFER_LINES) {
    appendLines(path, buf);
    buf.length = 0;
  }
}

function cleanOldLogs(): void {
  if (!existsSync(LOG_DIR)) return;

  const now = Date.now();
  const maxAge = config.logRetentionDays * 24 * 60 * 60 * 1000;

  try {
    for (const file of readdirSync(LOG_DIR)) {
      const filePath = join(LOG_DIR, file);
      if (now - statSync(filePath).mtimeMs > maxAge) {
        unlinkSync(filePath);
      }
    }
  } catch (err) {
    console.error(`[logger] cleanup failed: ${errorMessage(err)}`);
  }
}

export function initLogger(loggerConfig: LoggerConfig): void {
  config = loggerConfig;
  fileOutputEnabled = true;
  ensureLogDir();
  cleanOldLogs();
  if (!flushInterval) {
    flushInterval = setInterval(flushAllBuffers, FLUSH_INTERVAL_MS);
    flushInterval.unref();
  }
}

export function startLogMaintenance(): void {
  if (logCleanupInterval) return;
  logCleanupInterval = setInterval(cleanOldLogs, LOG_CLEANUP_INTERVAL_MS);
  logCleanupInterval.unref();
}

export function stopLogMaintenance(): void {
  if (logCleanupInterval) {
    clearInterval(logCleanupInterval);
    logCleanupInterval = null;
  }
  if (flushInterval) {
    clearInterval(flushInterval);
    flushInterval = null;
  }
  flushAllBuffers();
}

export function log(
  level: LogLevel,
  component: string,
  event: string,
  data?: Record<string, unknown>
): void {
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    event,
    ...(data && { data }),
  };

  if (fileOutputEnabled) {
    writeToFile(getLogPath("bot"), entry);
    if (level === "error") {
      writeToFile(getLogPath("error"), entry);
    }
    if (level === "debug") {
      writeToFile(getLogPath("debug"), entry);
    }
  }

  if (LEVEL_ORDER[level] < consoleThreshold) return;
  const consoleMsg = `[${entry.ts}] [${level.toUpperCase()}] [${component}] ${event}`;
  if (data && Object.keys(data).length > 0) {
    console.log(consoleMsg, JSON.stringify(data));
  } else {
    console.log(consoleMsg);
  }
}

export function debug(component: string, event: string, data?: Record<string, unknown>): void {
  if (config.debug) {
    log("debug", component, event, data);
  }
}

export function info(component: string, event: string, data?: Record<string, unknown>): void {
  log("info", component, event, data);
}

export function warn(component: string, event: string, data?: Record<string, unknown>): void {
  log("warn", component, event, data);
}

export function error(component: string, event: string, data?: Record<string, unknown>): void {
  log("error", component, event, data);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function getLogDir(): string {
  return LOG_DIR;
}
