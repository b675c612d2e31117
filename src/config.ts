import "dotenv/config";
import { isValidTimezone } from "./utils/time";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`Missing required env var: ${name}`);
  return value;
}

function getNumberEnv(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

function getTimezoneEnv(name: string, fallback: string) {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  if (!isValidTimezone(raw)) throw new Error(`Invalid time zone in ${name}: ${raw}`);
  return raw;
}

export type AppConfig = {
  mongoUri: string;
  jwtSecret: string;
  port: number;
  defaultTimezone: string;
};

export function loadConfig(): AppConfig {
  return {
    mongoUri: requireEnv("MONGODB_URI"),
    jwtSecret: requireEnv("JWT_SECRET"),
    port: getNumberEnv("PORT", 3000),
    defaultTimezone: getTimezoneEnv("DEFAULT_TIMEZONE", "America/Chicago"),
  };
}
