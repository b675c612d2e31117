import { DateTime } from "luxon";

export function isValidTimezone(timezone: string): boolean {
  if (!timezone.trim()) return false;
  return DateTime.now().setZone(timezone).isValid;
}

export function nowInZone(timezone: string): DateTime {
  const dt = DateTime.now().setZone(timezone);
  // Unknown zones come back invalid; fall back to UTC
  return dt.isValid ? dt : DateTime.now().setZone("utc");
}

/**
 * Project a stored instant onto the calendar of `ref`'s zone, so that
 * "same day" and "yesterday" are answered in the habit owner's local days.
 */
export function inZoneOf(date: Date, ref: DateTime): DateTime {
  return DateTime.fromJSDate(date, { zone: ref.zone });
}

export function isSameCalendarDay(date: Date, now: DateTime): boolean {
  return inZoneOf(date, now).hasSame(now, "day");
}

/**
 * Whole calendar days from `date` to `now` (0 = same day, 1 = yesterday).
 * Negative when `date` is on a later day than `now`.
 */
export function calendarDaysSince(date: Date, now: DateTime): number {
  const from = inZoneOf(date, now).startOf("day");
  // DST days are 23/25h long; diff in "days" stays calendar-based, round off float noise
  return Math.round(now.startOf("day").diff(from, "days").days);
}

export function addCalendarDays(date: Date, days: number, ref: DateTime): Date {
  return inZoneOf(date, ref).plus({ days }).toJSDate();
}

/**
 * Weekday numbered 1..7 starting on Sunday (Sun=1, Mon=2 .. Sat=7).
 * Luxon numbers them 1=Mon..7=Sun.
 */
export function sundayFirstWeekday(dt: DateTime): number {
  return (dt.weekday % 7) + 1;
}
