/**
 * One-shot reminder timers. Jobs live in memory only; a restart drops every
 * reminder that has not fired yet.
 */

import { debug, error, info } from "./logger";

const MAX_SET_TIMEOUT_MS = 2_147_483_647; // Node.js max setTimeout delay (~24.8 days)

export type ReminderDelivery<T> = (payload: T) => Promise<void>;

export type ScheduleResult =
  | { ok: true; handle: number }
  | { ok: false; reason: "not_future" | "shut_down" };

interface ReminderJob<T> {
  handle: number;
  fireAt: number;
  payload: T;
  timer: NodeJS.Timeout | null;
}

export class ReminderScheduler<T> {
  private readonly jobs = new Map<number, ReminderJob<T>>();
  private nextHandle = 1;
  private stopped = false;

  constructor(private readonly deliver: ReminderDelivery<T>) {}

  schedule(fireAt: Date, payload: T): ScheduleResult {
    if (this.stopped) {
      return { ok: false, reason: "shut_down" };
    }
    const target = fireAt.getTime();
    if (Number.isNaN(target) || target <= Date.now()) {
      return { ok: false, reason: "not_future" };
    }

    const job: ReminderJob<T> = { handle: this.nextHandle++, fireAt: target, payload, timer: null };
    this.jobs.set(job.handle, job);
    this.arm(job);

    info("reminders", "scheduled", {
      handle: job.handle,
      fireAt: fireAt.toISOString(),
      delayMs: target - Date.now(),
    });
    return { ok: true, handle: job.handle };
  }

  cancel(handle: number): boolean {
    const job = this.jobs.get(handle);
    if (!job) return false;
    this.jobs.delete(handle);
    if (job.timer) clearTimeout(job.timer);
    debug("reminders", "cancelled", { handle });
    return true;
  }

  pendingCount(): number {
    return this.jobs.size;
  }

  shutdown(): void {
    this.stopped = true;
    for (const job of this.jobs.values()) {
      if (job.timer) clearTimeout(job.timer);
    }
    const dropped = this.jobs.size;
    this.jobs.clear();
    info("reminders", "shutdown", { dropped });
  }

  private arm(job: ReminderJob<T>): void {
    const remaining = job.fireAt - Date.now();
    if (remaining <= 0) {
      this.fire(job.handle);
      return;
    }

    // Delays past the setTimeout ceiling are covered in chunks.
    const delay = Math.min(remaining, MAX_SET_TIMEOUT_MS);
    job.timer = setTimeout(() => {
      job.timer = null;
      if (remaining > MAX_SET_TIMEOUT_MS) {
        if (this.jobs.get(job.handle) === job) this.arm(job);
        return;
      }
      this.fire(job.handle);
    }, delay);
    job.timer.unref();
  }

  private fire(handle: number): void {
    // Removing the job first makes firing and cancel mutually exclusive.
    const job = this.jobs.get(handle);
    if (!job) return;
    this.jobs.delete(handle);

    info("reminders", "firing", { handle });
    Promise.resolve()
      .then(() => this.deliver(job.payload))
      .catch((err) => {
        error("reminders", "delivery_failed", {
          handle,
          error: err instanceof Error ? err.message : String(err),
        });
      });
  }
}
