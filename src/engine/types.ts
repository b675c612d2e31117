/**
 * Day of week, Sunday-first: 1=Sun, 2=Mon .. 7=Sat.
 */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const ALL_WEEKDAYS: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7];

/**
 * How often a habit is meant to happen. Governs how long a gap between two
 * completions may be before the streak breaks.
 */
export type HabitFrequency =
  | { kind: "daily" }
  | { kind: "everyOtherDay" }
  | { kind: "threeTimesPerWeek" }
  | { kind: "twicePerWeek" }
  | { kind: "oncePerWeek" }
  | { kind: "custom"; intervalDays?: number }; // no intervalDays => any gap is fine

export type FrequencyKind = HabitFrequency["kind"];

export type HabitType =
  | { kind: "simple" } // one tap per day
  | { kind: "incremental"; dailyTarget: number }; // N taps per day

export type HabitTypeKind = HabitType["kind"];

export type HabitRecurrence = {
  scheduledDays: readonly Weekday[];
  frequency: HabitFrequency;
  habitType: HabitType;
};

export type HabitProgressState = {
  streak: number;

  // null: not completed as of now (never, or today's completion was undone)
  lastCompletedDate: Date | null;

  // true once anything was completed today, even if undone afterwards
  wasCompletedToday: boolean;

  // sub-completions registered today (incremental habits)
  todayProgress: number;
};

/**
 * What the sync backend echoes back after it applied a completion or undo.
 */
export type ServerProgressEcho = {
  streak: number;
  progress: number;
};
