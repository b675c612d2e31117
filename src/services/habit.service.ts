import type { DateTime } from "luxon";
import {
  canIncrement,
  createProgressState,
  incrementProgress,
  isAtTarget,
  isCompletedToday,
  isSameProgressState,
  markCompleted,
  nextScheduledDate,
  progressFraction,
  reconcileWithServer,
  resetProgressIfNeeded,
  shouldBeActiveToday,
  toggleCompletion,
  undoCompletedToday,
} from "../engine/habitProgressEngine";
import { ALL_WEEKDAYS, type HabitProgressState, type HabitRecurrence, type ServerProgressEcho } from "../engine/types";
import { describeFrequency, isScheduledForToday } from "../engine/recurrence";
import { toProgressState, toRecurrence, type HabitRecord } from "../models/Habit";
import type { HabitRecordPatch, HabitRepository, ListHabitsOptions } from "../models/habitRepository";
import type { CreateHabitInput, UpdateHabitInput } from "./habitInput";
import { isSameCalendarDay, nowInZone } from "../utils/time";

/**
 * Habit service
 * - Loads a habit record, supplies the clock, runs the progress engine and
 *   writes the resulting state back
 * - Used by the HTTP API; does not know about requests or responses
 */

export class HabitServiceError extends Error {
  constructor(message: string, readonly status = 400) {
    super(message);
    this.name = "HabitServiceError";
  }
}

export type Clock = (timezone: string) => DateTime;

export const HABIT_ACTIONS = ["increment", "complete", "undo", "toggle"] as const;
export type HabitAction = (typeof HABIT_ACTIONS)[number];

export type HabitTodayView = {
  completed: boolean;
  progressFraction: number;
  canIncrement: boolean;
  scheduledToday: boolean;
  activeToday: boolean;
  nextScheduledDate: Date;
  frequencyDescription: string;
};

export type HabitView = HabitRecord & { today: HabitTodayView };

export type HabitActionResult = {
  habit: HabitView;
  changed: boolean; // false when the action was a no-op (double tap, nothing to undo)
};

export type HabitServiceOptions = {
  repository: HabitRepository;
  defaultTimezone: string;
  clock?: Clock;
};

export type HabitService = ReturnType<typeof createHabitService>;

function dayKey(now: DateTime): string {
  return now.toFormat("yyyy-MM-dd");
}

function runAction(
  action: HabitAction,
  state: HabitProgressState,
  recurrence: HabitRecurrence,
  now: DateTime
): HabitProgressState {
  switch (action) {
    case "increment":
      return incrementProgress(state, recurrence, now);
    case "complete":
      return markCompleted(state, recurrence, now);
    case "undo":
      return undoCompletedToday(state, recurrence, now);
    case "toggle":
      return toggleCompletion(state, recurrence, now);
  }
}

function toView(record: HabitRecord, now: DateTime): HabitView {
  const recurrence = toRecurrence(record);
  const state = toProgressState(record);

  return {
    ...record,
    today: {
      completed: isCompletedToday(state, recurrence, now),
      progressFraction: progressFraction(state, recurrence, now),
      canIncrement: canIncrement(state, recurrence),
      scheduledToday: isScheduledForToday(recurrence, now),
      activeToday: shouldBeActiveToday(state, recurrence, now),
      nextScheduledDate: nextScheduledDate(state, recurrence, now),
      frequencyDescription: describeFrequency(recurrence.frequency),
    },
  };
}

// Attempts per request when another request keeps writing the same habit
const MAX_WRITE_ATTEMPTS = 5;

type OpenedHabit = { record: HabitRecord; now: DateTime };

function buildPatch(current: HabitRecord, input: UpdateHabitInput): HabitRecordPatch {
  const patch: HabitRecordPatch = {};

  if (input.name !== undefined) patch.name = input.name;
  if (input.description !== undefined) patch.description = input.description ?? undefined;
  if (input.colorHex !== undefined) patch.colorHex = input.colorHex;
  if (input.reminderMessage !== undefined) patch.reminderMessage = input.reminderMessage;
  if (input.isEnabled !== undefined) patch.isEnabled = input.isEnabled;
  if (input.timezone !== undefined) patch.timezone = input.timezone;
  if (input.scheduledDays !== undefined) patch.scheduledDays = input.scheduledDays;
  if (input.frequency !== undefined) patch.frequency = input.frequency;
  if (input.customFrequency !== undefined) patch.customFrequency = input.customFrequency ?? undefined;
  if (input.type !== undefined) patch.type = input.type;
  if (input.dailyTarget !== undefined) patch.dailyTarget = input.dailyTarget;

  // Simple habits always target 1; keep today's progress inside the new target
  const type = patch.type ?? current.type;
  const target = type === "incremental" ? patch.dailyTarget ?? current.dailyTarget : 1;
  if (type === "simple") patch.dailyTarget = 1;
  if (current.todayProgress > target) patch.todayProgress = target;

  return patch;
}

export function createHabitService(opts: HabitServiceOptions) {
  const repo = opts.repository;
  const clock = opts.clock ?? nowInZone;

  async function load(userId: number, habitId: string): Promise<HabitRecord> {
    const record = await repo.findById(userId, habitId);
    if (!record) throw new HabitServiceError("Habit not found", 404);
    return record;
  }

  /**
   * Writes only if nobody else wrote the habit since `record` was read.
   * Resolves null when the write lost; throws when the habit is gone.
   */
  async function saveIfUnchanged(record: HabitRecord, patch: HabitRecordPatch): Promise<HabitRecord | null> {
    const saved = await repo.update(record.userId, record.id, patch, { expectedRevision: record.revision });
    if (saved) return saved;

    await load(record.userId, record.id);
    return null;
  }

  /**
   * Runs `attempt` on a freshly loaded record until it completes without a
   * lost write (attempt resolves null to ask for another go).
   */
  async function withRetry<T>(
    userId: number,
    habitId: string,
    attempt: (record: HabitRecord) => Promise<T | null>
  ): Promise<T> {
    for (let i = 0; i < MAX_WRITE_ATTEMPTS; i++) {
      const result = await attempt(await load(userId, habitId));
      if (result !== null) return result;
    }

    console.warn(`[HABIT] habit=${habitId} still conflicting after ${MAX_WRITE_ATTEMPTS} attempts`);
    throw new HabitServiceError("Habit was changed by another request, try again", 409);
  }

  /**
   * Day rollover, once per habit per local day. Running it more often would
   * forget an undo made earlier the same day.
   */
  async function openForToday(record: HabitRecord): Promise<OpenedHabit | null> {
    const now = clock(record.timezone);
    const today = dayKey(now);
    if (record.rolledOverOn === today) return { record, now };

    const rolled = resetProgressIfNeeded(toProgressState(record), toRecurrence(record), now);
    const saved = await saveIfUnchanged(record, { ...rolled, rolledOverOn: today });
    return saved ? { record: saved, now } : null;
  }

  /**
   * A lowered target can put today's progress at the target without a
   * completion behind it; record that completion.
   */
  async function countReachedTarget(record: HabitRecord, now: DateTime): Promise<HabitRecord | null> {
    const recurrence = toRecurrence(record);
    const state = toProgressState(record);

    if (recurrence.habitType.kind !== "incremental" || !isAtTarget(state, recurrence, now)) return record;
    if (state.lastCompletedDate && isSameCalendarDay(state.lastCompletedDate, now)) return record;

    const done = markCompleted(state, recurrence, now);
    if (isSameProgressState(state, done)) return record;

    const saved = await saveIfUnchanged(record, done);
    if (saved) console.log(`[HABIT] target reached habit=${record.id} streak ${state.streak} -> ${done.streak}`);
    return saved;
  }

  async function listHabits(userId: number, listOpts: ListHabitsOptions = {}): Promise<HabitView[]> {
    const records = await repo.list(userId, listOpts);
    const opened = await Promise.all(
      records.map(async (r) => (await openForToday(r)) ?? withRetry(userId, r.id, openForToday))
    );
    return opened.map(({ record, now }) => toView(record, now));
  }

  async function getHabit(userId: number, habitId: string): Promise<HabitView> {
    const { record, now } = await withRetry(userId, habitId, openForToday);
    return toView(record, now);
  }

  async function createHabit(userId: number, input: CreateHabitInput): Promise<HabitView> {
    const type = input.type ?? "simple";
    const frequency = input.frequency ?? "daily";
    const timezone = input.timezone ?? opts.defaultTimezone;

    const record = await repo.create({
      userId,
      name: input.name,
      description: input.description ?? undefined,
      colorHex: input.colorHex ?? "#007AFF",
      reminderMessage: input.reminderMessage ?? "Time for your habit!",
      isEnabled: input.isEnabled ?? true,
      timezone,
      scheduledDays: input.scheduledDays ?? [...ALL_WEEKDAYS],
      frequency,
      customFrequency: frequency === "custom" ? input.customFrequency ?? undefined : undefined,
      type,
      dailyTarget: type === "incremental" ? input.dailyTarget ?? 1 : 1,
      ...createProgressState(),
      rolledOverOn: dayKey(clock(timezone)),
    });

    console.log(`[HABIT] created habit=${record.id} user=${userId} type=${type} frequency=${frequency}`);
    return toView(record, clock(record.timezone));
  }

  async function updateHabit(userId: number, habitId: string, input: UpdateHabitInput): Promise<HabitView> {
    return withRetry(userId, habitId, async (loaded) => {
      const opened = await openForToday(loaded);
      if (!opened) return null;

      const patch = buildPatch(opened.record, input);
      const saved = await saveIfUnchanged(opened.record, patch);
      if (!saved) return null;

      const targetChanged = input.dailyTarget !== undefined || input.type !== undefined;
      const settled = targetChanged ? await countReachedTarget(saved, opened.now) : saved;
      if (!settled) return null;

      return toView(settled, opened.now);
    });
  }

  async function deleteHabit(userId: number, habitId: string): Promise<void> {
    const removed = await repo.remove(userId, habitId);
    if (!removed) throw new HabitServiceError("Habit not found", 404);
    console.log(`[HABIT] deleted habit=${habitId} user=${userId}`);
  }

  async function applyAction(userId: number, habitId: string, action: HabitAction): Promise<HabitActionResult> {
    return withRetry(userId, habitId, async (loaded) => {
      const opened = await openForToday(loaded);
      if (!opened) return null;
      const { record, now } = opened;

      const before = toProgressState(record);
      const after = runAction(action, before, toRecurrence(record), now);

      if (isSameProgressState(before, after)) {
        return { habit: toView(record, now), changed: false };
      }

      const saved = await saveIfUnchanged(record, after);
      if (!saved) return null;

      console.log(
        `[HABIT] ${action} habit=${record.id} streak ${before.streak} -> ${after.streak} progress ${before.todayProgress} -> ${after.todayProgress}`
      );
      return { habit: toView(saved, now), changed: true };
    });
  }

  async function reconcile(userId: number, habitId: string, echo: ServerProgressEcho): Promise<HabitActionResult> {
    return withRetry(userId, habitId, async (loaded) => {
      const opened = await openForToday(loaded);
      if (!opened) return null;
      const { record, now } = opened;

      const before = toProgressState(record);
      const after = reconcileWithServer(before, toRecurrence(record), echo);

      if (isSameProgressState(before, after)) {
        return { habit: toView(record, now), changed: false };
      }

      const saved = await saveIfUnchanged(record, after);
      if (!saved) return null;

      console.log(`[HABIT] reconcile habit=${record.id} streak ${before.streak} -> ${after.streak}`);
      return { habit: toView(saved, now), changed: true };
    });
  }

  return {
    listHabits,
    getHabit,
    createHabit,
    updateHabit,
    deleteHabit,
    applyAction,
    reconcile,
  };
}
