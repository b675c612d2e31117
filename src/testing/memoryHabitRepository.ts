import { Types } from "mongoose";
import type { HabitRecord } from "../models/Habit";
import type { HabitRepository } from "../models/habitRepository";

function copy(record: HabitRecord): HabitRecord {
  return {
    ...record,
    scheduledDays: [...record.scheduledDays],
    lastCompletedDate: record.lastCompletedDate ? new Date(record.lastCompletedDate.getTime()) : null,
  };
}

/**
 * In-process HabitRepository for tests. Records are copied in and out so
 * callers cannot mutate what is stored.
 */
export function createMemoryHabitRepository(now: () => Date = () => new Date()) {
  const records = new Map<string, HabitRecord>();

  const repo: HabitRepository = {
    async list(userId, opts = {}) {
      return [...records.values()]
        .filter((r) => r.userId === userId && (opts.includeDisabled || r.isEnabled))
        .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
        .map(copy);
    },

    async findById(userId, habitId) {
      const r = records.get(habitId);
      return r && r.userId === userId ? copy(r) : null;
    },

    async create(input) {
      const at = now();
      const record: HabitRecord = {
        ...input,
        id: new Types.ObjectId().toHexString(),
        revision: 0,
        createdAt: at,
        updatedAt: at,
      };
      records.set(record.id, copy(record));
      return copy(record);
    },

    async update(userId, habitId, patch, opts = {}) {
      const r = records.get(habitId);
      if (!r || r.userId !== userId) return null;
      if (opts.expectedRevision !== undefined && opts.expectedRevision !== r.revision) return null;

      const next: HabitRecord = { ...r, ...patch, revision: r.revision + 1, updatedAt: now() };
      records.set(habitId, copy(next));
      return copy(next);
    },

    async remove(userId, habitId) {
      const r = records.get(habitId);
      if (!r || r.userId !== userId) return false;
      return records.delete(habitId);
    },
  };

  return { repo, records };
}
