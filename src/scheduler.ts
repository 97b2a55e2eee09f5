import * as cron from "node-cron";
import type { DialogueSessions } from "./dialogue-state";
import { debug, error, info } from "./logger";

let sweepJob: cron.ScheduledTask | null = null;

export interface DialogueSweepOptions {
  cronExpression: string;
  idleTimeoutMinutes: number;
}

/** Resets dialogue drafts left untouched for longer than the idle timeout. */
export function sweepAbandonedDialogues(sessions: DialogueSessions, idleTimeoutMinutes: number): string[] {
  const reset = sessions.sweepIdle(idleTimeoutMinutes * 60 * 1000);
  if (reset.length > 0) {
    info("scheduler", "dialogues_expired", { count: reset.length });
  } else {
    debug("scheduler", "dialogue_sweep_idle", { sessions: sessions.size() });
  }
  return reset;
}

export function startScheduler(sessions: DialogueSessions, options: DialogueSweepOptions): void {
  if (sweepJob) return;

  if (!cron.validate(options.cronExpression)) {
    error("scheduler", "invalid_cron", { cron: options.cronExpression });
    return;
  }

  sweepJob = cron.schedule(options.cronExpression, () => {
    try {
      sweepAbandonedDialogues(sessions, options.idleTimeoutMinutes);
    } catch (err) {
      error("scheduler", "dialogue_sweep_failed", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  info("scheduler", "started", {
    cron: options.cronExpression,
    idleTimeoutMinutes: options.idleTimeoutMinutes,
  });
}

export function stopScheduler(): void {
  if (sweepJob) {
    sweepJob.stop();
    sweepJob = null;
  }
  info("scheduler", "stopped");
}
