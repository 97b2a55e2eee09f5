/**
 * Pure parsing of reminder dates and times. All wall-clock values are in the
 * process's local time zone. Nothing here throws.
 */

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export type ReminderTimeResult =
  | { ok: true; at: Date }
  | { ok: false; reason: "invalid_format" | "out_of_range" };

export type ReminderDateResult =
  | { ok: true; date: CalendarDate }
  | { ok: false; reason: "invalid_format" | "invalid_date" | "past_date" };

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;
const RELATIVE_PATTERN = /^in\s+(\d{1,4})\s*(hours?|hrs?|h|minutes?|mins?|m)$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const MONTH_DAY_PATTERN = /^(\d{1,2})-(\d{1,2})$/;

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** "HH:MM" / "H:MM" with hour 0-23 and minute 0-59. */
export function parseClockTime(text: string): ClockTime | undefined {
  const match = normalize(text).match(CLOCK_PATTERN);
  if (!match) return undefined;
  const hour = Number.parseInt(match[1], 10);
  const minute = Number.parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return undefined;
  return { hour, minute };
}

export function formatClockTime(clock: ClockTime): string {
  return `${pad2(clock.hour)}:${pad2(clock.minute)}`;
}

/** "in 2 hours", "in 45 min", "in 1h". Zero offsets are rejected. */
export function parseRelativeOffset(text: string): number | undefined {
  const match = normalize(text).match(RELATIVE_PATTERN);
  if (!match) return undefined;
  const amount = Number.parseInt(match[1], 10);
  if (amount <= 0) return undefined;
  const unit = match[2].startsWith("h") ? HOUR_MS : MINUTE_MS;
  return amount * unit;
}

/**
 * A clock time rolls forward to its next occurrence (tomorrow when it is not
 * after `now` today); a relative phrase is added to `now`.
 */
export function parseReminderTime(text: string, now: Date): ReminderTimeResult {
  const offset = parseRelativeOffset(text);
  if (offset !== undefined) {
    return { ok: true, at: new Date(now.getTime() + offset) };
  }

  const normalized = normalize(text);
  if (!CLOCK_PATTERN.test(normalized)) {
    return { ok: false, reason: "invalid_format" };
  }
  const clock = parseClockTime(normalized);
  if (!clock) {
    return { ok: false, reason: "out_of_range" };
  }

  const today = calendarDateOf(now);
  let at = combineDateAndTime(today, clock);
  if (at.getTime() <= now.getTime()) {
    at = combineDateAndTime(addDays(today, 1), clock);
  }
  return { ok: true, at };
}

/** "today", "tomorrow", "YYYY-MM-DD" or "MM-DD" (this year). Days before today are rejected. */
export function parseReminderDate(text: string, now: Date): ReminderDateResult {
  const normalized = normalize(text);
  const today = calendarDateOf(now);
  if (normalized === "today") return { ok: true, date: today };
  if (normalized === "tomorrow") return { ok: true, date: addDays(today, 1) };

  let year: number;
  let month: number;
  let day: number;
  const iso = normalized.match(ISO_DATE_PATTERN);
  const monthDay = normalized.match(MONTH_DAY_PATTERN);
  if (iso) {
    year = Number.parseInt(iso[1], 10);
    month = Number.parseInt(iso[2], 10);
    day = Number.parseInt(iso[3], 10);
  } else if (monthDay) {
    year = today.year;
    month = Number.parseInt(monthDay[1], 10);
    day = Number.parseInt(monthDay[2], 10);
  } else {
    return { ok: false, reason: "invalid_format" };
  }

  const candidate = new Date(year, month - 1, day);
  if (candidate.getFullYear() !== year || candidate.getMonth() !== month - 1 || candidate.getDate() !== day) {
    return { ok: false, reason: "invalid_date" };
  }
  const date: CalendarDate = { year, month, day };
  if (compareDates(date, today) < 0) {
    return { ok: false, reason: "past_date" };
  }
  return { ok: true, date };
}

export function calendarDateOf(value: Date): CalendarDate {
  return { year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate() };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return calendarDateOf(new Date(date.year, date.month - 1, date.day + days));
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function combineDateAndTime(date: CalendarDate, clock: ClockTime): Date {
  return new Date(date.year, date.month - 1, date.day, clock.hour, clock.minute, 0, 0);
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}
