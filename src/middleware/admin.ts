import { Request, Response, NextFunction } from "express";
import { timingSafeEqual } from "crypto";
import { ENV } from "../lib/env";

function sameToken(a: string, b: string) {
  const x = Buffer.from(a);
  const y = Buffer.from(b);
  return x.length === y.length && timingSafeEqual(x, y);
}

export function adminOnly(req: Request, res: Response, next: NextFunction) {
  const token = req.header("x-admin-token") ?? "";
  if (!ENV.ADMIN_TOKEN || !sameToken(token, ENV.ADMIN_TOKEN)) {
    return res.status(401).json({ ok: false, error: "unauthorized (admin)" });
  }
  next();
}
