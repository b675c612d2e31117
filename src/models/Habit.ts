import mongoose, { Schema, Model, Types } from "mongoose";
import { toWeekdays } from "../engine/recurrence";
import type {
  FrequencyKind,
  HabitFrequency,
  HabitProgressState,
  HabitRecurrence,
  HabitType,
  HabitTypeKind,
} from "../engine/types";

export const FREQUENCY_KINDS: readonly FrequencyKind[] = [
  "daily",
  "everyOtherDay",
  "threeTimesPerWeek",
  "twicePerWeek",
  "oncePerWeek",
  "custom",
];

export const HABIT_TYPE_KINDS: readonly HabitTypeKind[] = ["simple", "incremental"];

export type HabitDoc = {
  _id: Types.ObjectId;

  userId: number;

  name: string;
  description?: string;
  colorHex: string;
  reminderMessage: string;
  isEnabled: boolean;

  // Calendar days (today / yesterday / streak gaps) are taken in this zone
  timezone: string;

  // Recurrence
  scheduledDays: number[]; // 1=Sun .. 7=Sat
  frequency: FrequencyKind;
  customFrequency?: number; // interval in days, frequency "custom" only
  type: HabitTypeKind;
  dailyTarget: number; // 1 for simple habits

  // Progress (owned by the engine)
  streak: number;
  lastCompletedDate: Date | null;
  wasCompletedToday: boolean;
  todayProgress: number;

  // Local day (yyyy-MM-dd) the day rollover last ran for
  rolledOverOn?: string;

  // Bumped on every update; conditional writes compare against it
  revision: number;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * Plain habit record handed around the service layer: the stored document
 * with a string id.
 */
export type HabitRecord = Omit<HabitDoc, "_id"> & { id: string };

const HabitSchema = new Schema<HabitDoc>(
  {
    userId: { type: Number, required: true, index: true },

    name: { type: String, required: true, trim: true },
    description: { type: String, required: false, trim: true },
    colorHex: { type: String, required: true, default: "#007AFF" },
    reminderMessage: { type: String, required: true, default: "Time for your habit!" },
    isEnabled: { type: Boolean, required: true, default: true, index: true },

    timezone: { type: String, required: true },

    scheduledDays: { type: [Number], required: true, default: () => [1, 2, 3, 4, 5, 6, 7] },
    frequency: {
      type: String,
      required: true,
      enum: FREQUENCY_KINDS,
      default: "daily",
    },
    customFrequency: { type: Number, required: false, min: 1 },
    type: {
      type: String,
      required: true,
      enum: HABIT_TYPE_KINDS,
      default: "simple",
    },
    dailyTarget: { type: Number, required: true, min: 1, default: 1 },

    streak: { type: Number, required: true, min: 0, default: 0 },
    lastCompletedDate: { type: Date, required: false, default: null },
    wasCompletedToday: { type: Boolean, required: true, default: false },
    todayProgress: { type: Number, required: true, min: 0, default: 0 },
    rolledOverOn: { type: String, required: false },
    revision: { type: Number, required: true, min: 0, default: 0 },
  },
  { timestamps: true }
);

HabitSchema.index({ userId: 1, isEnabled: 1, updatedAt: -1 });

export const Habit: Model<HabitDoc> =
  (mongoose.models.Habit as Model<HabitDoc>) ||
  mongoose.model<HabitDoc>("Habit", HabitSchema);

export function toHabitRecord(doc: HabitDoc): HabitRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId,
    name: doc.name,
    description: doc.description,
    colorHex: doc.colorHex,
    reminderMessage: doc.reminderMessage,
    isEnabled: doc.isEnabled,
    timezone: doc.timezone,
    scheduledDays: [...doc.scheduledDays],
    frequency: doc.frequency,
    customFrequency: doc.customFrequency,
    type: doc.type,
    dailyTarget: doc.dailyTarget,
    streak: doc.streak,
    lastCompletedDate: doc.lastCompletedDate ?? null,
    wasCompletedToday: doc.wasCompletedToday,
    todayProgress: doc.todayProgress,
    rolledOverOn: doc.rolledOverOn,
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

// ---------------------------------------------------------------------------
// Record <-> engine types
// ---------------------------------------------------------------------------

function toFrequency(kind: FrequencyKind, customFrequency: number | undefined): HabitFrequency {
  if (kind === "custom") return { kind, intervalDays: customFrequency };
  return { kind };
}

function toHabitType(kind: HabitTypeKind, dailyTarget: number): HabitType {
  if (kind === "incremental") return { kind, dailyTarget };
  return { kind };
}

export function toRecurrence(record: HabitRecord): HabitRecurrence {
  return {
    scheduledDays: toWeekdays(record.scheduledDays),
    frequency: toFrequency(record.frequency, record.customFrequency),
    habitType: toHabitType(record.type, record.dailyTarget),
  };
}

export function toProgressState(record: HabitRecord): HabitProgressState {
  return {
    streak: record.streak,
    lastCompletedDate: record.lastCompletedDate,
    wasCompletedToday: record.wasCompletedToday,
    todayProgress: record.todayProgress,
  };
}
