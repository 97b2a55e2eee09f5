import "dotenv/config";
import { env } from "./env";
import { loadConfig } from "./config";
import { DialogueEngine } from "./dialogue-engine";
import { DialogueSessions } from "./dialogue-state";
import { reminderNotification } from "./dialogue-views";
import { ConfigurationError } from "./errors";
import { startHealthMonitor, startHealthServer, stopHealthMonitor } from "./health";
import { initLogger, info, error, getLogDir, startLogMaintenance, stopLogMaintenance } from "./logger";
import { NotificationFanout } from "./notification-fanout";
import { createBot, registerDialogueHandlers, startPolling, TelegramMessageSink } from "./poller";
import { ReminderScheduler } from "./reminder-scheduler";
import { RoomStore } from "./room-store";
import { assertRuntimeEnv, RuntimeSettings } from "./runtime-env";
import { startScheduler, stopScheduler } from "./scheduler";
import { createStorage } from "./storage";
import { TodoStore } from "./todo-store";
import type { ReminderPayload } from "./types";

/** Missing or malformed environment is fatal: exit before serving anything. */
function requireRuntimeSettings(): RuntimeSettings {
  try {
    return assertRuntimeEnv(process.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      error("daemon", "configuration_error", { error: err.message });
      stopLogMaintenance();
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  // Load configuration first
  const config = loadConfig();

  initLogger({
    debug: config.debug,
    logRetentionDays: config.logRetentionDays,
  });
  startLogMaintenance();

  info("daemon", "starting", {
    configPath: env.TODO_BOT_CONFIG,
    logDir: getLogDir(),
    debug: config.debug,
  });

  const settings = requireRuntimeSettings();

  const store = createStorage({ kind: settings.storageKind, databaseUrl: settings.databaseUrl });
  await store.init();
  info("daemon", "store_ready", { kind: settings.storageKind });

  startHealthMonitor();
  const healthServer = await startHealthServer(env.PORT);

  const bot = await createBot(settings.botToken);
  const sink = new TelegramMessageSink(bot.api);

  const sessions = new DialogueSessions();
  const rooms = new RoomStore(store, { maxCodeAttempts: config.roomCodeMaxAttempts });
  const fanout = new NotificationFanout(rooms, sink);
  const todos = new TodoStore(store, fanout);
  const reminders = new ReminderScheduler<ReminderPayload>((payload) =>
    sink.sendMessage(payload.userId, reminderNotification(payload))
  );
  const engine = new DialogueEngine({
    rooms,
    todos,
    reminders,
    sessions,
    timePresets: config.reminderTimePresets,
    maxTaskLength: config.maxTaskLength,
  });

  registerDialogueHandlers(bot, engine);

  startScheduler(sessions, {
    cronExpression: config.dialogueSweepCron,
    idleTimeoutMinutes: config.dialogueIdleTimeoutMinutes,
  });

  // Handle graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    info("daemon", "shutdown_starting", { signal, pendingReminders: reminders.pendingCount() });

    // Stop all components
    stopScheduler();
    reminders.shutdown();
    await bot.stop();
    await healthServer.close();
    stopHealthMonitor();
    await store.close();

    info("daemon", "shutdown_complete");
    stopLogMaintenance();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err) => {
      error("daemon", "shutdown_error", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => {
      error("daemon", "shutdown_error", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });

  // Handle uncaught errors
  process.on("uncaughtException", (err) => {
    error("daemon", "uncaught_exception", {
      error: err.message,
      stack: err.stack?.split("\n").slice(0, 10).join("\n"),
    });
  });

  process.on("unhandledRejection", (reason) => {
    error("daemon", "unhandled_rejection", {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack?.split("\n").slice(0, 5).join("\n") : undefined,
    });
  });

  try {
    await startPolling(bot);
  } catch (err) {
    error("daemon", "fatal_error", {
      error: err instanceof Error ? err.message : String(err),
    });
    stopLogMaintenance();
    process.exit(1);
  }
}

main().catch((err) => {
  error("daemon", "startup_failed", {
    error: err instanceof Error ? err.message : String(err),
  });
  stopLogMaintenance();
  process.exit(1);
});
