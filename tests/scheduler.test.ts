import { afterEach, describe, expect, it, vi } from "vitest";
import { DialogueSessions } from "../src/dialogue-state";
import { sweepAbandonedDialogues } from "../src/scheduler";

describe("sweepAbandonedDialogues", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resets drafts idle past the timeout", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 9, 18, 10, 0));
    const sessions = new DialogueSessions();
    sessions.setState("A", { kind: "entering_task", roomCode: "4821", category: "movie" });

    vi.advanceTimersByTime(29 * 60 * 1000);
    expect(sweepAbandonedDialogues(sessions, 30)).toEqual([]);

    vi.advanceTimersByTime(2 * 60 * 1000);
    expect(sweepAbandonedDialogues(sessions, 30)).toEqual(["A"]);
    expect(sessions.getState("A")).toEqual({ kind: "idle" });
  });
});
