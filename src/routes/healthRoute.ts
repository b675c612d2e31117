// src/routes/healthRoute.ts
import type { Request, Response } from "express";

export function healthRoute(_req: Request, res: Response) {
  res.type("text/plain").send("OK");
}
