import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";

export function signUserToken(userId: number, secret: string, ttlSeconds = 900) {
  return jwt.sign({ userId }, secret, { expiresIn: ttlSeconds });
}

function getBearerToken(req: Request) {
  const h = String(req.headers.authorization || "");
  if (h.startsWith("Bearer ")) return h.slice(7);
  return null;
}

/**
 * Bearer JWT auth. Puts the caller's numeric user id on res.locals.userId.
 */
export function requireUser(secret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const tok = getBearerToken(req);
    if (!tok) {
      res.status(401).json({ ok: false, error: "Missing token" });
      return;
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(tok, secret);
    } catch {
      res.status(401).json({ ok: false, error: "Invalid token" });
      return;
    }

    const userId = typeof payload === "object" ? Number(payload.userId) : NaN;
    if (!Number.isFinite(userId)) {
      res.status(401).json({ ok: false, error: "Invalid token payload" });
      return;
    }

    res.locals.userId = userId;
    next();
  };
}

export function userIdOf(res: Response): number {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== "number") throw new Error("requireUser must run before this handler");
  return userId;
}
