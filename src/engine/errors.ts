export class HabitInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HabitInvariantError";
  }
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

/**
 * Fail fast on malformed engine input outside production.
 * In production the engine trusts its caller and the check is skipped.
 */
export function devAssert(condition: boolean, message: string): void {
  if (isProduction()) return;
  if (!condition) throw new HabitInvariantError(message);
}

export function assertNever(value: never): never {
  throw new HabitInvariantError(`Unhandled variant: ${JSON.stringify(value)}`);
}
