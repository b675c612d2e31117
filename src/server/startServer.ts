import http from "http";
import express, { type ErrorRequestHandler } from "express";
import { healthRoute } from "../routes/healthRoute";
import { makeHabitsRouter } from "../routes/habitsApi";
import type { HabitService } from "../services/habit.service";
import { requireUser } from "./auth";

export type AppOptions = {
  habitService: HabitService;
  jwtSecret: string;
};

export type ServerOptions = AppOptions & {
  port: number;
  host?: string;
};

const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ ok: false, error: "Invalid JSON" });
    return;
  }
  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, err);
  res.status(500).json({ ok: false, error: "Server error" });
};

export function createApp(opts: AppOptions) {
  const app = express();

  app.use((req, _res, next) => {
    console.log(`[HTTP] ${req.method} ${req.originalUrl}`);
    next();
  });

  app.get("/health", healthRoute);

  app.use("/api/habits", express.json(), requireUser(opts.jwtSecret), makeHabitsRouter(opts.habitService));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use(onError);

  return app;
}

export function startServer(opts: ServerOptions): Promise<http.Server> {
  const app = createApp(opts);
  const host = opts.host ?? "0.0.0.0";

  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once("error", reject);
    server.listen(opts.port, host, () => {
      console.log(`[HTTP] listening on ${host}:${opts.port}`);
      console.log(`[HTTP] health endpoint: /health`);
      console.log(`[HTTP] habits API: /api/habits`);
      resolve(server);
    });
  });
}
