import { describe, expect, it } from "vitest";
import {
  addDays,
  combineDateAndTime,
  formatCalendarDate,
  parseClockTime,
  parseRelativeOffset,
  parseReminderDate,
  parseReminderTime,
} from "../src/reminder-time";

const now = new Date(2026, 9, 18, 10, 30);

describe("parseReminderTime", () => {
  it("rejects hours past 23 and minutes past 59", () => {
    expect(parseReminderTime("25:00", now)).toEqual({ ok: false, reason: "out_of_range" });
    expect(parseReminderTime("12:60", now)).toEqual({ ok: false, reason: "out_of_range" });
  });

  it("rejects malformed input", () => {
    for (const text of ["", "noon", "9.30", "12:5", "in 0 minutes", "in two hours", "ab:cd"]) {
      expect(parseReminderTime(text, now)).toEqual({ ok: false, reason: "invalid_format" });
    }
  });

  it("rolls a clock time that already passed today to tomorrow", () => {
    expect(parseReminderTime("09:00", now)).toEqual({ ok: true, at: new Date(2026, 9, 19, 9, 0) });
    expect(parseReminderTime("10:30", now)).toEqual({ ok: true, at: new Date(2026, 9, 19, 10, 30) });
  });

  it("keeps a later clock time on the same day", () => {
    expect(parseReminderTime("11:00", now)).toEqual({ ok: true, at: new Date(2026, 9, 18, 11, 0) });
    expect(parseReminderTime(" 7:05 ", new Date(2026, 9, 18, 6, 0))).toEqual({
      ok: true,
      at: new Date(2026, 9, 18, 7, 5),
    });
  });

  it("adds relative offsets to now", () => {
    expect(parseReminderTime("in 2 hours", now)).toEqual({ ok: true, at: new Date(now.getTime() + 2 * 60 * 60 * 1000) });
    expect(parseReminderTime("In 45 min", now)).toEqual({ ok: true, at: new Date(now.getTime() + 45 * 60 * 1000) });
    expect(parseRelativeOffset("in 1h")).toBe(60 * 60 * 1000);
    expect(parseRelativeOffset("in 3 minutes")).toBe(3 * 60 * 1000);
  });
});

describe("parseReminderDate", () => {
  it("understands today and tomorrow", () => {
    expect(parseReminderDate("today", now)).toEqual({ ok: true, date: { year: 2026, month: 10, day: 18 } });
    expect(parseReminderDate("Tomorrow", now)).toEqual({ ok: true, date: { year: 2026, month: 10, day: 19 } });
  });

  it("accepts full and month-day dates from today on", () => {
    expect(parseReminderDate("2026-12-24", now)).toEqual({ ok: true, date: { year: 2026, month: 12, day: 24 } });
    expect(parseReminderDate("10-18", now)).toEqual({ ok: true, date: { year: 2026, month: 10, day: 18 } });
  });

  it("rejects past days, impossible dates and other text", () => {
    expect(parseReminderDate("2026-10-17", now)).toEqual({ ok: false, reason: "past_date" });
    expect(parseReminderDate("01-05", now)).toEqual({ ok: false, reason: "past_date" });
    expect(parseReminderDate("2026-02-30", now)).toEqual({ ok: false, reason: "invalid_date" });
    expect(parseReminderDate("2026-13-01", now)).toEqual({ ok: false, reason: "invalid_date" });
    expect(parseReminderDate("next week", now)).toEqual({ ok: false, reason: "invalid_format" });
  });
});

describe("calendar helpers", () => {
  it("crosses month boundaries when adding days", () => {
    expect(addDays({ year: 2026, month: 10, day: 31 }, 1)).toEqual({ year: 2026, month: 11, day: 1 });
    expect(formatCalendarDate({ year: 2026, month: 3, day: 7 })).toBe("2026-03-07");
  });

  it("builds local timestamps from a date and a clock time", () => {
    const clock = parseClockTime("18:45");
    if (!clock) throw new Error("expected clock");
    expect(combineDateAndTime({ year: 2026, month: 10, day: 18 }, clock)).toEqual(new Date(2026, 9, 18, 18, 45));
  });
});
