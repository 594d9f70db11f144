import { Router, Request, Response } from "express";
import { getFeedClient } from "../lib/bsky";
import { describeError, httpStatusFor, RateLimitedError } from "../lib/errors";
import { logger } from "../lib/logger";
import { AUTHOR_FEED_FILTERS } from "../types/bsky";
import type { AuthorFeedFilter } from "../types/bsky";
import type { FeedResponse } from "../types/api";

export const feedRouter = Router();

export type FeedQuery = {
  actor: string;
  limit: number;
  cursor?: string;
  filter?: AuthorFeedFilter;
};

/** Query string → feed request; range checks are left to the client. */
export function parseFeedQuery(q: Record<string, unknown>): FeedQuery {
  const actor = String(q.actor ?? "").trim();
  const limitParam = parseInt(String(q.limit ?? "20"), 10);
  const cursor = typeof q.cursor === "string" && q.cursor ? q.cursor : undefined;
  const filter = AUTHOR_FEED_FILTERS.find((f) => f === q.filter);
  return {
    actor,
    limit: isNaN(limitParam) ? 20 : limitParam,
    ...(cursor ? { cursor } : {}),
    ...(filter ? { filter } : {}),
  };
}

function sendError(res: Response, route: string, e: unknown) {
  const report = describeError(e);
  logger.warn({ route, error: report }, "request failed");
  if (e instanceof RateLimitedError && e.retryAfterSeconds !== undefined) {
    res.set("Retry-After", String(e.retryAfterSeconds));
  }
  return res.status(httpStatusFor(e)).json({ ok: false, error: report });
}

/**
 * GET /v1/feed?actor=someone.bsky.social&limit=20&cursor=...
 * - one page of the actor's normalized posts
 * - next_cursor: pass back as ?cursor=... for the next page, null when done
 */
feedRouter.get("/feed", async (req: Request, res: Response) => {
  const q = parseFeedQuery(req.query);
  if (!q.actor) return res.status(400).json({ error: "Missing ?actor" });

  const ac = new AbortController();
  // client went away before we answered
  res.on("close", () => {
    if (!res.writableEnded) ac.abort();
  });
  try {
    const page = await getFeedClient().fetchAuthorFeed(q.actor, q.limit, q.cursor, {
      filter: q.filter,
      signal: ac.signal,
    });
    const payload: FeedResponse = {
      items: page.posts,
      next_cursor: page.nextCursor ?? null,
    };
    return res.json(payload);
  } catch (e) {
    return sendError(res, "/v1/feed", e);
  }
});

/**
 * GET /v1/actors?term=economist&limit=5
 */
feedRouter.get("/actors", async (req: Request, res: Response) => {
  const term = String(req.query.term ?? "").trim();
  if (!term) return res.status(400).json({ error: "Missing ?term" });
  const limitParam = parseInt(String(req.query.limit ?? "10"), 10);

  try {
    const actors = await getFeedClient().searchActors(
      term,
      isNaN(limitParam) ? 10 : limitParam
    );
    return res.json({ items: actors });
  } catch (e) {
    return sendError(res, "/v1/actors", e);
  }
});
