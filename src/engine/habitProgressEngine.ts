import type { DateTime } from "luxon";
import { devAssert, isProduction } from "./errors";
import {
  dailyTargetOf,
  isScheduledForToday,
  isWeekday,
  maxAllowedGap,
  minimumActiveGap,
  scheduleStepDays,
} from "./recurrence";
import type { HabitProgressState, HabitRecurrence, ServerProgressEcho } from "./types";
import { addCalendarDays, calendarDaysSince, isSameCalendarDay } from "../utils/time";

/**
 * Habit progress engine.
 *
 * Every operation is a pure function of (state, recurrence, now) and returns
 * a new state; the input is never mutated. Redundant calls (completing twice,
 * undoing with nothing to undo, incrementing past the target) return the
 * input state unchanged. Calendar days are taken in the zone carried by `now`.
 */

export function createProgressState(): HabitProgressState {
  return {
    streak: 0,
    lastCompletedDate: null,
    wasCompletedToday: false,
    todayProgress: 0,
  };
}

function checkWellFormed(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): void {
  if (isProduction()) return;

  const target = dailyTargetOf(recurrence.habitType);
  devAssert(Number.isInteger(target) && target >= 1, `dailyTarget must be a positive integer, got ${target}`);
  devAssert(Number.isInteger(state.streak) && state.streak >= 0, `streak must be a non-negative integer, got ${state.streak}`);
  devAssert(
    Number.isInteger(state.todayProgress) && state.todayProgress >= 0 && state.todayProgress <= target,
    `todayProgress must be within 0..${target}, got ${state.todayProgress}`
  );
  devAssert(recurrence.scheduledDays.every(isWeekday), "scheduledDays must hold weekdays 1..7");

  if (recurrence.frequency.kind === "custom" && recurrence.frequency.intervalDays !== undefined) {
    const n = recurrence.frequency.intervalDays;
    devAssert(Number.isInteger(n) && n >= 1, `custom intervalDays must be >= 1, got ${n}`);
  }

  devAssert(now.isValid, "now must be a valid DateTime");
  if (state.lastCompletedDate) {
    devAssert(calendarDaysSince(state.lastCompletedDate, now) >= 0, "lastCompletedDate is in the future");
  }
}

function completedOnSameDay(state: HabitProgressState, now: DateTime): boolean {
  return state.lastCompletedDate !== null && isSameCalendarDay(state.lastCompletedDate, now);
}

function daysSinceLastCompletion(state: HabitProgressState, now: DateTime): number | null {
  if (!state.lastCompletedDate) return null;
  return calendarDaysSince(state.lastCompletedDate, now);
}

export function isSameProgressState(a: HabitProgressState, b: HabitProgressState): boolean {
  return (
    a.streak === b.streak &&
    a.wasCompletedToday === b.wasCompletedToday &&
    a.todayProgress === b.todayProgress &&
    (a.lastCompletedDate?.getTime() ?? null) === (b.lastCompletedDate?.getTime() ?? null)
  );
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function isCompletedToday(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): boolean {
  if (recurrence.habitType.kind === "incremental") {
    return state.todayProgress >= recurrence.habitType.dailyTarget;
  }
  return completedOnSameDay(state, now);
}

/**
 * Whether a completion at `now` continues the streak under the habit's
 * frequency. Always true for a habit that has no last completion.
 */
export function isCompletionValid(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): boolean {
  const gap = daysSinceLastCompletion(state, now);
  if (gap === null) return true;

  const maxGap = maxAllowedGap(recurrence.frequency);
  if (maxGap === null) return true;

  return gap <= maxGap;
}

export function shouldBeActiveToday(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): boolean {
  if (!isScheduledForToday(recurrence, now)) return false;

  const gap = daysSinceLastCompletion(state, now);
  if (gap === null) return true;

  const minGap = minimumActiveGap(recurrence.frequency);
  if (minGap === null) return true;

  return gap >= minGap;
}

export function progressFraction(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): number {
  if (recurrence.habitType.kind === "incremental") {
    const target = recurrence.habitType.dailyTarget;
    if (target <= 0) return 0;
    return state.todayProgress / target;
  }
  return isCompletedToday(state, recurrence, now) ? 1 : 0;
}

export function isAtTarget(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): boolean {
  return isCompletedToday(state, recurrence, now);
}

export function canIncrement(state: HabitProgressState, recurrence: HabitRecurrence): boolean {
  return recurrence.habitType.kind === "incremental" && state.todayProgress < recurrence.habitType.dailyTarget;
}

/**
 * Next planned occurrence: last completion plus the frequency's step, or
 * `now` when there is nothing to step from.
 */
export function nextScheduledDate(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): Date {
  if (!state.lastCompletedDate) return now.toJSDate();

  const step = scheduleStepDays(recurrence.frequency);
  if (step === null) return now.toJSDate();

  return addCalendarDays(state.lastCompletedDate, step, now);
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

/**
 * Day-rollover normalization. Run once per session before anything reads
 * "today" state.
 *
 * An incremental habit whose lastCompletedDate is null keeps its
 * todayProgress here, even if that progress is from an earlier day.
 */
export function resetProgressIfNeeded(
  state: HabitProgressState,
  recurrence: HabitRecurrence,
  now: DateTime
): HabitProgressState {
  checkWellFormed(state, recurrence, now);

  if (completedOnSameDay(state, now)) return state;

  const next: HabitProgressState = { ...state, wasCompletedToday: false };

  if (recurrence.habitType.kind === "incremental" && state.lastCompletedDate !== null) {
    next.todayProgress = 0;
  }

  return next;
}

export function markCompleted(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): HabitProgressState {
  checkWellFormed(state, recurrence, now);

  const completed = (streak: number): HabitProgressState => ({
    ...state,
    streak,
    lastCompletedDate: now.toJSDate(),
    wasCompletedToday: true,
  });

  // Completed earlier today, undone, now completed again: give back what undo took
  if (state.wasCompletedToday && state.lastCompletedDate === null) {
    return completed(Math.max(1, state.streak + 1));
  }

  const gap = daysSinceLastCompletion(state, now);

  if (gap === null) return completed(1);

  if (gap === 0) return state;

  if (gap === 1) return completed(state.streak + 1);

  return completed(isCompletionValid(state, recurrence, now) ? state.streak + 1 : 1);
}

/**
 * The "tap" action. Incremental habits count one sub-completion and complete
 * when the target is reached; simple habits complete directly.
 */
export function incrementProgress(
  state: HabitProgressState,
  recurrence: HabitRecurrence,
  now: DateTime
): HabitProgressState {
  checkWellFormed(state, recurrence, now);

  const habitType = recurrence.habitType;

  if (habitType.kind === "simple") {
    if (isCompletedToday(state, recurrence, now)) return state;
    return markCompleted(state, recurrence, now);
  }

  // Only roll over when nothing was counted yet today
  const current = state.todayProgress === 0 ? resetProgressIfNeeded(state, recurrence, now) : state;

  if (current.todayProgress >= habitType.dailyTarget) return current;

  const progressed: HabitProgressState = { ...current, todayProgress: current.todayProgress + 1 };

  if (progressed.todayProgress === habitType.dailyTarget && !isCompletedToday(current, recurrence, now)) {
    return markCompleted(progressed, recurrence, now);
  }

  return progressed;
}

export function undoCompletedToday(
  state: HabitProgressState,
  recurrence: HabitRecurrence,
  now: DateTime
): HabitProgressState {
  checkWellFormed(state, recurrence, now);

  if (!completedOnSameDay(state, now)) return state;

  return {
    ...state,
    lastCompletedDate: null,
    wasCompletedToday: true,
    todayProgress: recurrence.habitType.kind === "incremental" ? 0 : state.todayProgress,
    streak: Math.max(0, state.streak - 1),
  };
}

/**
 * Checkbox-style toggle: undo when today is already complete, complete otherwise.
 */
export function toggleCompletion(state: HabitProgressState, recurrence: HabitRecurrence, now: DateTime): HabitProgressState {
  if (isCompletedToday(state, recurrence, now)) {
    return undoCompletedToday(state, recurrence, now);
  }
  return markCompleted(state, recurrence, now);
}

/**
 * Fold a sync echo into local state. The local streak wins unless the server
 * disagrees by more than one; the server's progress is always taken.
 */
export function reconcileWithServer(
  state: HabitProgressState,
  recurrence: HabitRecurrence,
  echo: ServerProgressEcho
): HabitProgressState {
  const streak = Math.abs(echo.streak - state.streak) > 1 ? Math.max(0, echo.streak) : state.streak;
  const target = dailyTargetOf(recurrence.habitType);
  const todayProgress = Math.min(target, Math.max(0, echo.progress));

  return { ...state, streak, todayProgress };
}
