// src/routes/habitsApi.ts

import { Router, type Request, type Response } from "express";
import { HABIT_ACTIONS, HabitServiceError, type HabitService } from "../services/habit.service";
import { parseCreateHabit, parseServerEcho, parseUpdateHabit } from "../services/habitInput";
import { userIdOf } from "../server/auth";

type Handler = (req: Request, res: Response) => Promise<void>;

function bad(res: Response, message: string, status = 400) {
  res.status(status).json({ ok: false, error: message });
}

function fail(req: Request, res: Response, e: unknown) {
  const status = e instanceof HabitServiceError ? e.status : 500;
  if (status >= 500) console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, e);
  bad(res, status >= 500 ? "Server error" : e instanceof Error ? e.message : String(e), status);
}

// Express 4 does not catch rejected handlers
function route(fn: Handler) {
  return (req: Request, res: Response) => {
    void fn(req, res).catch((e: unknown) => fail(req, res, e));
  };
}

function flag(v: unknown) {
  return v === "1" || v === "true";
}

/**
 * /api/habits — expects requireUser() to have run.
 */
export function makeHabitsRouter(service: HabitService) {
  const router = Router();

  router.get(
    "/",
    route(async (req, res) => {
      const habits = await service.listHabits(userIdOf(res), { includeDisabled: flag(req.query.includeDisabled) });
      res.json({ ok: true, habits });
    })
  );

  router.post(
    "/",
    route(async (req, res) => {
      const parsed = parseCreateHabit(req.body);
      if (!parsed.ok) return bad(res, parsed.error);

      const habit = await service.createHabit(userIdOf(res), parsed.value);
      res.status(201).json({ ok: true, habit });
    })
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      const habit = await service.getHabit(userIdOf(res), req.params.id);
      res.json({ ok: true, habit });
    })
  );

  router.put(
    "/:id",
    route(async (req, res) => {
      const parsed = parseUpdateHabit(req.body);
      if (!parsed.ok) return bad(res, parsed.error);

      const habit = await service.updateHabit(userIdOf(res), req.params.id, parsed.value);
      res.json({ ok: true, habit });
    })
  );

  router.delete(
    "/:id",
    route(async (req, res) => {
      await service.deleteHabit(userIdOf(res), req.params.id);
      res.json({ ok: true });
    })
  );

  for (const action of HABIT_ACTIONS) {
    router.post(
      `/:id/${action}`,
      route(async (req, res) => {
        const { habit, changed } = await service.applyAction(userIdOf(res), req.params.id, action);
        res.json({ ok: true, habit, changed });
      })
    );
  }

  router.post(
    "/:id/reconcile",
    route(async (req, res) => {
      const parsed = parseServerEcho(req.body);
      if (!parsed.ok) return bad(res, parsed.error);

      const { habit, changed } = await service.reconcile(userIdOf(res), req.params.id, parsed.value);
      res.json({ ok: true, habit, changed });
    })
  );

  return router;
}
