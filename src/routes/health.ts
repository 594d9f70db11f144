import { Router, Request, Response } from "express";
import { getFeedClient } from "../lib/bsky";

export const healthRouter = Router();

// 1) Liveness
healthRouter.get("/live", (_req: Request, res: Response) => {
  res.json({ ok: true, service: "skyline-collector", status: "alive" });
});

// 2) Session state of the shared client (no network call)
healthRouter.get("/session", (_req: Request, res: Response) => {
  try {
    res.json({ ok: true, state: getFeedClient().getState() });
  } catch (e) {
    res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
  }
});
