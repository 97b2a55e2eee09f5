import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReminderScheduler } from "../src/reminder-scheduler";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("ReminderScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 9, 18, 10, 30));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects times that are not in the future", () => {
    const scheduler = new ReminderScheduler<string>(vi.fn(async () => {}));

    expect(scheduler.schedule(new Date(Date.now()), "now")).toEqual({ ok: false, reason: "not_future" });
    expect(scheduler.schedule(new Date(Date.now() - 1000), "past")).toEqual({ ok: false, reason: "not_future" });
    expect(scheduler.schedule(new Date(Number.NaN), "broken")).toEqual({ ok: false, reason: "not_future" });
    expect(scheduler.pendingCount()).toBe(0);
  });

  it("delivers exactly once when the time is reached", async () => {
    const deliver = vi.fn(async (_payload: string) => {});
    const scheduler = new ReminderScheduler<string>(deliver);

    const result = scheduler.schedule(new Date(Date.now() + 60_000), "book flights");
    expect(result.ok).toBe(true);
    expect(scheduler.pendingCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(deliver).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver).toHaveBeenCalledWith("book flights");

    await vi.advanceTimersByTimeAsync(10 * 60_000);
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount()).toBe(0);
  });

  it("covers delays beyond the timer ceiling", async () => {
    const deliver = vi.fn(async (_payload: string) => {});
    const scheduler = new ReminderScheduler<string>(deliver);

    scheduler.schedule(new Date(Date.now() + 30 * DAY_MS), "renew passport");

    await vi.advanceTimersByTimeAsync(25 * DAY_MS);
    expect(deliver).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(5 * DAY_MS);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it("does not deliver a cancelled reminder", async () => {
    const deliver = vi.fn(async (_payload: string) => {});
    const scheduler = new ReminderScheduler<string>(deliver);

    const result = scheduler.schedule(new Date(Date.now() + 60_000), "book flights");
    if (!result.ok) throw new Error("expected scheduling to succeed");

    expect(scheduler.cancel(result.handle)).toBe(true);
    expect(scheduler.cancel(result.handle)).toBe(false);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(deliver).not.toHaveBeenCalled();
  });

  it("absorbs delivery failures", async () => {
    const rejecting = vi.fn(async (_payload: string) => {
      throw new Error("chat not found");
    });
    const throwing = vi.fn((_payload: string): Promise<void> => {
      throw new Error("sink unavailable");
    });
    const first = new ReminderScheduler<string>(rejecting);
    const second = new ReminderScheduler<string>(throwing);

    first.schedule(new Date(Date.now() + 1000), "a");
    second.schedule(new Date(Date.now() + 1000), "b");
    await vi.advanceTimersByTimeAsync(1000);

    expect(rejecting).toHaveBeenCalledTimes(1);
    expect(throwing).toHaveBeenCalledTimes(1);
    expect(first.pendingCount()).toBe(0);
    expect(second.pendingCount()).toBe(0);
  });

  it("drops pending jobs and refuses new ones after shutdown", async () => {
    const deliver = vi.fn(async (_payload: string) => {});
    const scheduler = new ReminderScheduler<string>(deliver);
    scheduler.schedule(new Date(Date.now() + 60_000), "book flights");

    scheduler.shutdown();

    expect(scheduler.pendingCount()).toBe(0);
    expect(scheduler.schedule(new Date(Date.now() + 60_000), "later")).toEqual({ ok: false, reason: "shut_down" });
    await vi.advanceTimersByTimeAsync(120_000);
    expect(deliver).not.toHaveBeenCalled();
  });
});
