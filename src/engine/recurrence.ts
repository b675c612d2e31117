import type { DateTime } from "luxon";
import { assertNever } from "./errors";
import { ALL_WEEKDAYS, type HabitFrequency, type HabitRecurrence, type HabitType, type Weekday } from "./types";
import { sundayFirstWeekday } from "../utils/time";

export function isWeekday(n: number): n is Weekday {
  return Number.isInteger(n) && n >= 1 && n <= 7;
}

export function toWeekdays(days: readonly number[]): Weekday[] {
  const out: Weekday[] = [];
  for (const d of days) {
    if (isWeekday(d) && !out.includes(d)) out.push(d);
  }
  return out.sort((a, b) => a - b);
}

export function defaultRecurrence(): HabitRecurrence {
  return {
    scheduledDays: ALL_WEEKDAYS,
    frequency: { kind: "daily" },
    habitType: { kind: "simple" },
  };
}

export function dailyTargetOf(habitType: HabitType): number {
  switch (habitType.kind) {
    case "simple":
      return 1;
    case "incremental":
      return habitType.dailyTarget;
    default:
      return assertNever(habitType);
  }
}

/**
 * Longest gap, in calendar days, between two completions that still extends
 * the streak. null means any gap is accepted.
 */
export function maxAllowedGap(frequency: HabitFrequency): number | null {
  switch (frequency.kind) {
    case "daily":
      return 1;
    case "everyOtherDay":
      return 2;
    case "threeTimesPerWeek":
      return 3;
    case "twicePerWeek":
      return 4;
    case "oncePerWeek":
      return 7;
    case "custom":
      return frequency.intervalDays ?? null;
    default:
      return assertNever(frequency);
  }
}

/**
 * Days that must pass since the last completion before the habit shows up
 * as due again. null means it is due every scheduled day.
 *
 * NOTE: not the same table as maxAllowedGap. everyOtherDay and
 * threeTimesPerWeek both resurface after 2 days; keep them apart.
 */
export function minimumActiveGap(frequency: HabitFrequency): number | null {
  switch (frequency.kind) {
    case "daily":
      return null;
    case "everyOtherDay":
      return 2;
    case "threeTimesPerWeek":
      return 2;
    case "twicePerWeek":
      return 3;
    case "oncePerWeek":
      return 7;
    case "custom":
      return frequency.intervalDays ?? null;
    default:
      return assertNever(frequency);
  }
}

/**
 * Days to add to the last completion to get the next planned occurrence.
 */
export function scheduleStepDays(frequency: HabitFrequency): number | null {
  switch (frequency.kind) {
    case "daily":
      return 1;
    case "everyOtherDay":
      return 2;
    case "threeTimesPerWeek":
      return 2;
    case "twicePerWeek":
      return 3;
    case "oncePerWeek":
      return 7;
    case "custom":
      return frequency.intervalDays ?? null;
    default:
      return assertNever(frequency);
  }
}

export function describeFrequency(frequency: HabitFrequency): string {
  switch (frequency.kind) {
    case "daily":
      return "Every day";
    case "everyOtherDay":
      return "Every other day";
    case "threeTimesPerWeek":
      return "3 times per week";
    case "twicePerWeek":
      return "2 times per week";
    case "oncePerWeek":
      return "Once per week";
    case "custom":
      return frequency.intervalDays !== undefined ? `Every ${frequency.intervalDays} days` : "Custom schedule";
    default:
      return assertNever(frequency);
  }
}

export function isScheduledForToday(recurrence: HabitRecurrence, now: DateTime): boolean {
  const today = sundayFirstWeekday(now);
  return recurrence.scheduledDays.some((d) => d === today);
}
