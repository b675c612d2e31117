import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DateTime } from "luxon";
import { createHabitService, HabitServiceError, type HabitService } from "./habit.service";
import { createMemoryHabitRepository } from "../testing/memoryHabitRepository";

const zone = "America/Chicago";
const USER = 42;

let current: DateTime;
let service: HabitService;

function setNow(iso: string) {
  current = DateTime.fromISO(iso, { zone });
}

async function errorOf(p: Promise<unknown>): Promise<unknown> {
  return p.then(
    () => undefined,
    (e: unknown) => e
  );
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  setNow("2026-03-10T09:00");

  const { repo } = createMemoryHabitRepository(() => current.toJSDate());
  service = createHabitService({
    repository: repo,
    defaultTimezone: zone,
    clock: (tz) => current.setZone(tz),
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createHabit", () => {
  it("fills in defaults and starts with no progress", async () => {
    const habit = await service.createHabit(USER, { name: "Stretch" });

    expect(habit.userId).toBe(USER);
    expect(habit.type).toBe("simple");
    expect(habit.frequency).toBe("daily");
    expect(habit.timezone).toBe(zone);
    expect(habit.dailyTarget).toBe(1);
    expect(habit.scheduledDays).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(habit.colorHex).toBe("#007AFF");
    expect(habit.streak).toBe(0);
    expect(habit.lastCompletedDate).toBeNull();
    expect(habit.rolledOverOn).toBe("2026-03-10");

    expect(habit.today.completed).toBe(false);
    expect(habit.today.progressFraction).toBe(0);
    expect(habit.today.canIncrement).toBe(false);
    expect(habit.today.scheduledToday).toBe(true);
    expect(habit.today.activeToday).toBe(true);
    expect(habit.today.frequencyDescription).toBe("Every day");
  });

  it("ignores dailyTarget for simple habits", async () => {
    const habit = await service.createHabit(USER, { name: "Read", dailyTarget: 4 });
    expect(habit.dailyTarget).toBe(1);
  });

  it("keys the rollover day in the habit's own zone", async () => {
    // 23:00Z, already the 11th in Tokyo
    setNow("2026-03-10T18:00");
    const habit = await service.createHabit(USER, { name: "Journal", timezone: "Asia/Tokyo" });
    expect(habit.rolledOverOn).toBe("2026-03-11");
  });
});

describe("applyAction", () => {
  it("continues a daily streak on the next day", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });

    const first = await service.applyAction(USER, id, "complete");
    expect(first.changed).toBe(true);
    expect(first.habit.streak).toBe(1);
    expect(first.habit.today.completed).toBe(true);

    setNow("2026-03-11T08:00");
    const opened = await service.getHabit(USER, id);
    expect(opened.today.completed).toBe(false);
    expect(opened.wasCompletedToday).toBe(false);
    expect(opened.rolledOverOn).toBe("2026-03-11");

    const second = await service.applyAction(USER, id, "complete");
    expect(second.habit.streak).toBe(2);
  });

  it("restarts the streak after a missed day", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    await service.applyAction(USER, id, "complete");

    setNow("2026-03-12T08:00");
    const res = await service.applyAction(USER, id, "complete");
    expect(res.habit.streak).toBe(1);
  });

  it("reports a second completion on the same day as unchanged", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    await service.applyAction(USER, id, "complete");

    const again = await service.applyAction(USER, id, "complete");
    expect(again.changed).toBe(false);
    expect(again.habit.streak).toBe(1);
  });

  it("gives the streak back when an undone completion is redone the same day", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    await service.applyAction(USER, id, "complete");

    setNow("2026-03-11T08:00");
    await service.applyAction(USER, id, "complete");

    const undone = await service.applyAction(USER, id, "undo");
    expect(undone.habit.streak).toBe(1);
    expect(undone.habit.lastCompletedDate).toBeNull();
    expect(undone.habit.wasCompletedToday).toBe(true);
    expect(undone.habit.today.completed).toBe(false);

    setNow("2026-03-11T20:00");
    const redone = await service.applyAction(USER, id, "complete");
    expect(redone.habit.streak).toBe(2);
  });

  it("does nothing on undo when today is not complete", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    const res = await service.applyAction(USER, id, "undo");
    expect(res.changed).toBe(false);
    expect(res.habit.streak).toBe(0);
  });

  it("toggles between complete and undone", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });

    const on = await service.applyAction(USER, id, "toggle");
    expect(on.habit.today.completed).toBe(true);
    expect(on.habit.streak).toBe(1);

    const off = await service.applyAction(USER, id, "toggle");
    expect(off.habit.today.completed).toBe(false);
    expect(off.habit.streak).toBe(0);

    const onAgain = await service.applyAction(USER, id, "toggle");
    expect(onAgain.habit.streak).toBe(1);
  });

  it("counts taps toward an incremental target", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 3 });

    const one = await service.applyAction(USER, id, "increment");
    expect(one.habit.todayProgress).toBe(1);
    expect(one.habit.today.progressFraction).toBeCloseTo(1 / 3);
    expect(one.habit.today.completed).toBe(false);
    expect(one.habit.today.canIncrement).toBe(true);

    await service.applyAction(USER, id, "increment");
    const three = await service.applyAction(USER, id, "increment");
    expect(three.habit.todayProgress).toBe(3);
    expect(three.habit.streak).toBe(1);
    expect(three.habit.today.completed).toBe(true);
    expect(three.habit.today.canIncrement).toBe(false);

    const extra = await service.applyAction(USER, id, "increment");
    expect(extra.changed).toBe(false);
    expect(extra.habit.todayProgress).toBe(3);
  });

  it("clears incremental progress on the first visit of a new day", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 2 });
    await service.applyAction(USER, id, "increment");
    await service.applyAction(USER, id, "increment");

    setNow("2026-03-11T07:00");
    const habit = await service.getHabit(USER, id);
    expect(habit.todayProgress).toBe(0);
    expect(habit.streak).toBe(1);
    expect(habit.today.completed).toBe(false);
  });
});

describe("updateHabit", () => {
  it("clamps today's progress to a lowered target", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 5 });
    for (let i = 0; i < 3; i++) await service.applyAction(USER, id, "increment");

    const updated = await service.updateHabit(USER, id, { dailyTarget: 2 });
    expect(updated.dailyTarget).toBe(2);
    expect(updated.todayProgress).toBe(2);
  });

  it("counts a completion when a lowered target is already met", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 5 });
    for (let i = 0; i < 3; i++) await service.applyAction(USER, id, "increment");

    const updated = await service.updateHabit(USER, id, { dailyTarget: 2 });
    expect(updated.today.completed).toBe(true);
    expect(updated.streak).toBe(1);
    expect(updated.lastCompletedDate?.getTime()).toBe(current.toMillis());

    setNow("2026-03-11T08:00");
    const fresh = await service.getHabit(USER, id);
    expect(fresh.todayProgress).toBe(0);
    expect(fresh.today.completed).toBe(false);

    await service.applyAction(USER, id, "increment");
    const done = await service.applyAction(USER, id, "increment");
    expect(done.changed).toBe(true);
    expect(done.habit.today.completed).toBe(true);
    expect(done.habit.streak).toBe(2);
  });

  it("keeps the streak when lowering the target of a habit done today", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 3 });
    for (let i = 0; i < 3; i++) await service.applyAction(USER, id, "increment");

    const updated = await service.updateHabit(USER, id, { dailyTarget: 2 });
    expect(updated.todayProgress).toBe(2);
    expect(updated.streak).toBe(1);
  });

  it("resets the target when switching to a simple habit", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 5 });
    for (let i = 0; i < 3; i++) await service.applyAction(USER, id, "increment");

    const updated = await service.updateHabit(USER, id, { type: "simple" });
    expect(updated.type).toBe("simple");
    expect(updated.dailyTarget).toBe(1);
    expect(updated.todayProgress).toBe(1);
  });

  it("clears optional fields given null", async () => {
    const { id } = await service.createHabit(USER, {
      name: "Walk",
      description: "around the block",
      frequency: "custom",
      customFrequency: 4,
    });

    const updated = await service.updateHabit(USER, id, { description: null, customFrequency: null });
    expect(updated.description).toBeUndefined();
    expect(updated.customFrequency).toBeUndefined();
    expect(updated.today.frequencyDescription).toBe("Custom schedule");
  });
});

describe("concurrent requests", () => {
  it("keeps both of two simultaneous taps", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 5 });

    const results = await Promise.all([
      service.applyAction(USER, id, "increment"),
      service.applyAction(USER, id, "increment"),
    ]);

    expect(results.map((r) => r.habit.todayProgress).sort()).toEqual([1, 2]);
    expect((await service.getHabit(USER, id)).todayProgress).toBe(2);
  });

  it("gives up with 409 when every write loses", async () => {
    const { repo } = createMemoryHabitRepository(() => current.toJSDate());
    const stuck = createHabitService({
      repository: { ...repo, update: async () => null },
      defaultTimezone: zone,
      clock: (tz) => current.setZone(tz),
    });
    const { id } = await stuck.createHabit(USER, { name: "Stretch" });

    const err = await errorOf(stuck.applyAction(USER, id, "complete"));
    expect(err).toBeInstanceOf(HabitServiceError);
    expect(err instanceof HabitServiceError && err.status).toBe(409);
  });
});

describe("reconcile", () => {
  it("adopts the server streak only when it is more than one off", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    await service.applyAction(USER, id, "complete");

    const close = await service.reconcile(USER, id, { streak: 2, progress: 0 });
    expect(close.changed).toBe(false);
    expect(close.habit.streak).toBe(1);

    const far = await service.reconcile(USER, id, { streak: 5, progress: 0 });
    expect(far.changed).toBe(true);
    expect(far.habit.streak).toBe(5);
  });

  it("takes the server progress, clamped to the target", async () => {
    const { id } = await service.createHabit(USER, { name: "Water", type: "incremental", dailyTarget: 4 });

    const res = await service.reconcile(USER, id, { streak: 0, progress: 9 });
    expect(res.habit.todayProgress).toBe(4);
  });
});

describe("lookups", () => {
  it("lists enabled habits unless asked for all", async () => {
    await service.createHabit(USER, { name: "Stretch" });
    await service.createHabit(USER, { name: "Paused", isEnabled: false });
    await service.createHabit(7, { name: "Someone else's" });

    expect((await service.listHabits(USER)).map((h) => h.name)).toEqual(["Stretch"]);
    expect(await service.listHabits(USER, { includeDisabled: true })).toHaveLength(2);
  });

  it("hides other users' habits", async () => {
    const { id } = await service.createHabit(7, { name: "Someone else's" });

    const err = await errorOf(service.getHabit(USER, id));
    expect(err).toBeInstanceOf(HabitServiceError);
    expect(err instanceof HabitServiceError && err.status).toBe(404);
  });

  it("deletes a habit once", async () => {
    const { id } = await service.createHabit(USER, { name: "Stretch" });
    await service.deleteHabit(USER, id);

    const err = await errorOf(service.deleteHabit(USER, id));
    expect(err instanceof HabitServiceError && err.message).toBe("Habit not found");
    await expect(service.getHabit(USER, id)).rejects.toThrow("Habit not found");
  });
});
