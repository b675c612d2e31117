import { toWeekdays } from "../engine/recurrence";
import type { FrequencyKind, HabitTypeKind, ServerProgressEcho, Weekday } from "../engine/types";
import { FREQUENCY_KINDS, HABIT_TYPE_KINDS } from "../models/Habit";
import { isValidTimezone } from "../utils/time";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type HabitSettingsInput = {
  name?: string;
  description?: string | null; // null clears
  colorHex?: string;
  reminderMessage?: string;
  isEnabled?: boolean;
  timezone?: string;
  scheduledDays?: Weekday[];
  frequency?: FrequencyKind;
  customFrequency?: number | null; // null clears
  type?: HabitTypeKind;
  dailyTarget?: number;
};

export type CreateHabitInput = HabitSettingsInput & { name: string };

export type UpdateHabitInput = HabitSettingsInput;

const MAX_NAME_LENGTH = 200;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidHexColor(c: string) {
  return /^#([0-9a-fA-F]{6}|[0-9a-fA-F]{3})$/.test(c);
}

function isPositiveInt(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 1;
}

function isOneOf<T extends string>(list: readonly T[], value: unknown): value is T {
  return list.some((item) => item === value);
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

/**
 * Shared field checks for create and update. Only keys present in the body
 * are validated and copied.
 */
function parseSettings(b: Record<string, unknown>): ParseResult<HabitSettingsInput> {
  const out: HabitSettingsInput = {};

  if (b.name !== undefined) {
    if (typeof b.name !== "string" || !b.name.trim()) return fail("name cannot be empty");
    if (b.name.trim().length > MAX_NAME_LENGTH) return fail(`name must be at most ${MAX_NAME_LENGTH} characters`);
    out.name = b.name.trim();
  }

  if (b.description !== undefined) {
    if (b.description === null) out.description = null;
    else if (typeof b.description === "string") out.description = b.description.trim();
    else return fail("description must be a string");
  }

  if (b.colorHex !== undefined) {
    if (typeof b.colorHex !== "string" || !isValidHexColor(b.colorHex)) {
      return fail("Invalid colorHex (expected hex like #5b8def)");
    }
    out.colorHex = b.colorHex;
  }

  if (b.reminderMessage !== undefined) {
    if (typeof b.reminderMessage !== "string" || !b.reminderMessage.trim()) return fail("reminderMessage cannot be empty");
    out.reminderMessage = b.reminderMessage.trim();
  }

  if (b.isEnabled !== undefined) {
    if (typeof b.isEnabled !== "boolean") return fail("isEnabled must be a boolean");
    out.isEnabled = b.isEnabled;
  }

  if (b.timezone !== undefined) {
    if (typeof b.timezone !== "string" || !isValidTimezone(b.timezone)) return fail("Invalid timezone");
    out.timezone = b.timezone.trim();
  }

  if (b.scheduledDays !== undefined) {
    if (!Array.isArray(b.scheduledDays)) return fail("scheduledDays must be an array of days 1-7");
    const days = toWeekdays(b.scheduledDays.map((d: unknown) => Number(d)));
    if (days.length === 0) return fail("scheduledDays must include at least one day 1-7");
    out.scheduledDays = days;
  }

  if (b.frequency !== undefined) {
    if (!isOneOf(FREQUENCY_KINDS, b.frequency)) return fail(`frequency must be one of: ${FREQUENCY_KINDS.join(", ")}`);
    out.frequency = b.frequency;
  }

  if (b.customFrequency !== undefined) {
    if (b.customFrequency === null) out.customFrequency = null;
    else if (isPositiveInt(b.customFrequency)) out.customFrequency = b.customFrequency;
    else return fail("customFrequency must be a whole number of days >= 1");
  }

  if (b.type !== undefined) {
    if (!isOneOf(HABIT_TYPE_KINDS, b.type)) return fail(`type must be one of: ${HABIT_TYPE_KINDS.join(", ")}`);
    out.type = b.type;
  }

  if (b.dailyTarget !== undefined) {
    if (!isPositiveInt(b.dailyTarget)) return fail("dailyTarget must be a whole number >= 1");
    out.dailyTarget = b.dailyTarget;
  }

  return { ok: true, value: out };
}

export function parseCreateHabit(body: unknown): ParseResult<CreateHabitInput> {
  const b: Record<string, unknown> = isRecord(body) ? body : {};
  if (typeof b.name !== "string" || !b.name.trim()) return fail("name is required");

  const parsed = parseSettings(b);
  if (!parsed.ok) return parsed;

  const name = parsed.value.name;
  if (name === undefined) return fail("name is required");

  return { ok: true, value: { ...parsed.value, name } };
}

export function parseUpdateHabit(body: unknown): ParseResult<UpdateHabitInput> {
  const b: Record<string, unknown> = isRecord(body) ? body : {};
  if (Object.keys(b).length === 0) return fail("No updates provided");
  return parseSettings(b);
}

export function parseServerEcho(body: unknown): ParseResult<ServerProgressEcho> {
  const b: Record<string, unknown> = isRecord(body) ? body : {};
  const { streak, progress } = b;

  if (typeof streak !== "number" || !Number.isInteger(streak) || streak < 0) {
    return fail("streak must be a whole number >= 0");
  }
  if (typeof progress !== "number" || !Number.isInteger(progress) || progress < 0) {
    return fail("progress must be a whole number >= 0");
  }

  return { ok: true, value: { streak, progress } };
}
