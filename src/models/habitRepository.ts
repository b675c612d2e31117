import { Types, type FilterQuery, type UpdateQuery } from "mongoose";
import { Habit, toHabitRecord, type HabitDoc, type HabitRecord } from "./Habit";

export type NewHabitRecord = Omit<HabitRecord, "id" | "revision" | "createdAt" | "updatedAt">;

export type HabitRecordPatch = Partial<Omit<HabitRecord, "id" | "userId" | "revision" | "createdAt" | "updatedAt">>;

export type UpdateHabitOptions = {
  // Only write when the stored revision still equals this one
  expectedRevision?: number;
};

export type ListHabitsOptions = {
  includeDisabled?: boolean;
};

/**
 * Storage for habit records. Every lookup is scoped to the owning user.
 */
export interface HabitRepository {
  list(userId: number, opts?: ListHabitsOptions): Promise<HabitRecord[]>;
  findById(userId: number, habitId: string): Promise<HabitRecord | null>;
  create(input: NewHabitRecord): Promise<HabitRecord>;
  /**
   * Applies the patch and bumps the revision. Resolves null when the habit
   * does not exist or its revision no longer matches `expectedRevision`.
   */
  update(userId: number, habitId: string, patch: HabitRecordPatch, opts?: UpdateHabitOptions): Promise<HabitRecord | null>;
  remove(userId: number, habitId: string): Promise<boolean>;
}

export function isHabitId(id: string): boolean {
  return Types.ObjectId.isValid(id);
}

export function createMongoHabitRepository(): HabitRepository {
  return {
    async list(userId, opts = {}) {
      const q: { userId: number; isEnabled?: boolean } = { userId };
      if (!opts.includeDisabled) q.isEnabled = true;

      const docs = await Habit.find(q).sort({ updatedAt: -1 }).lean<HabitDoc[]>();
      return docs.map(toHabitRecord);
    },

    async findById(userId, habitId) {
      if (!isHabitId(habitId)) return null;

      const doc = await Habit.findOne({ _id: habitId, userId }).lean<HabitDoc>();
      return doc ? toHabitRecord(doc) : null;
    },

    async create(input) {
      const doc = await Habit.create(input);
      return toHabitRecord(doc);
    },

    async update(userId, habitId, patch, opts = {}) {
      if (!isHabitId(habitId)) return null;

      // Mongoose strips undefined from $set; cleared optional fields need $unset
      const $set: Record<string, unknown> = {};
      const $unset: Record<string, 1> = {};
      for (const [key, value] of Object.entries(patch)) {
        if (value === undefined) $unset[key] = 1;
        else $set[key] = value;
      }

      const update: UpdateQuery<HabitDoc> = { $inc: { revision: 1 } };
      if (Object.keys($set).length) update.$set = $set;
      if (Object.keys($unset).length) update.$unset = $unset;

      const filter: FilterQuery<HabitDoc> = { _id: habitId, userId };
      if (opts.expectedRevision === 0) {
        // Documents written before the field existed count as revision 0
        filter.$or = [{ revision: 0 }, { revision: { $exists: false } }];
      } else if (opts.expectedRevision !== undefined) {
        filter.revision = opts.expectedRevision;
      }

      const doc = await Habit.findOneAndUpdate(filter, update, { new: true }).lean<HabitDoc>();
      return doc ? toHabitRecord(doc) : null;
    },

    async remove(userId, habitId) {
      if (!isHabitId(habitId)) return false;

      const res = await Habit.deleteOne({ _id: habitId, userId });
      return res.deletedCount > 0;
    },
  };
}
