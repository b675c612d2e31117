import type http from "http";
import { loadConfig } from "./config";
import { connectDb, disconnectDb } from "./db";
import { createMongoHabitRepository } from "./models/habitRepository";
import { createHabitService } from "./services/habit.service";
import { startServer } from "./server/startServer";

function closeServer(server: http.Server) {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main() {
  const config = loadConfig();

  await connectDb(config.mongoUri);

  const habitService = createHabitService({
    repository: createMongoHabitRepository(),
    defaultTimezone: config.defaultTimezone,
  });

  const server = await startServer({
    habitService,
    jwtSecret: config.jwtSecret,
    port: config.port,
  });

  async function shutdown(signal: string) {
    console.log(`[SHUTDOWN] signal received: ${signal}`);

    try {
      await closeServer(server);
      await disconnectDb();
    } catch (e) {
      console.error("[SHUTDOWN] error:", e);
      process.exit(1);
    }

    process.exit(0);
  }

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("Fatal startup error:", e);
  process.exit(1);
});
