import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import pLimit from "p-limit";
import { z } from "zod";
import { ENV } from "../lib/env";
import { logger } from "../lib/logger";
import { getFeedClient } from "../lib/bsky";
import { withRetries } from "../lib/rate_limit";
import type { RetryOptions } from "../lib/rate_limit";
import { AuthenticationError, ErrorReport, describeError } from "../lib/errors";
import type { SessionedFeedClient } from "../lib/feed_client";
import type { Post } from "../types/api";
import { COLLECT } from "./config";

const log = logger.child({ job: "collect" });

export type FeedSource = Pick<SessionedFeedClient, "searchActors" | "fetchAllForActor">;

export type DateWindow = { since?: number; until?: number }; // epoch ms, inclusive

export type CollectOptions = {
  actors: string[];
  searchTerms: string[];
  window?: DateWindow;
  pageLimit?: number;
  maxPostsPerActor?: number;
  parallel?: number;
  retry?: RetryOptions;
};

export type CollectResult = {
  actors: string[];
  posts: Post[];
  failures: { actor: string; error: ErrorReport }[];
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DD` bounds cover the whole UTC day; anything else must parse as a date. */
export function parseWindow(since?: string, until?: string): DateWindow {
  const window: DateWindow = {};
  if (since) {
    const ms = Date.parse(DATE_ONLY.test(since) ? `${since}T00:00:00.000Z` : since);
    if (Number.isNaN(ms)) throw new Error(`Invalid since date: ${since}`);
    window.since = ms;
  }
  if (until) {
    const ms = Date.parse(DATE_ONLY.test(until) ? `${until}T23:59:59.999Z` : until);
    if (Number.isNaN(ms)) throw new Error(`Invalid until date: ${until}`);
    window.until = ms;
  }
  if (window.since !== undefined && window.until !== undefined && window.since > window.until) {
    throw new Error(`Empty date window: ${since} > ${until}`);
  }
  return window;
}

export function inWindow(post: Post, window: DateWindow = {}) {
  const t = Date.parse(post.createdAt);
  if (window.since !== undefined && t < window.since) return false;
  if (window.until !== undefined && t > window.until) return false;
  return true;
}

/** Explicit handles first, then the top search hit per term; duplicates dropped. */
export async function resolveActors(
  client: FeedSource,
  actors: string[],
  searchTerms: string[],
  retry: RetryOptions = {}
): Promise<string[]> {
  const handles = actors.map((a) => a.trim().toLowerCase()).filter(Boolean);

  for (const term of searchTerms) {
    try {
      const found = await withRetries(
        () => client.searchActors(term, COLLECT.searchResultsPerTerm),
        { tries: COLLECT.retryTries, ...retry, label: `search:${term}` }
      );
      if (found.length === 0) {
        log.warn({ term }, "no actor matched search term");
        continue;
      }
      log.info({ term, handle: found[0].handle }, "actor found");
      handles.push(found[0].handle.toLowerCase());
    } catch (e) {
      if (e instanceof AuthenticationError) throw e;
      log.error({ term, error: describeError(e) }, "actor search failed");
    }
  }
  return [...new Set(handles)];
}

/** Every post of one actor inside the window; a retry re-walks from page one. */
export async function collectActor(
  client: FeedSource,
  actor: string,
  opts: Pick<CollectOptions, "window" | "pageLimit" | "maxPostsPerActor" | "retry"> = {}
): Promise<Post[]> {
  const pageLimit = opts.pageLimit ?? COLLECT.pageLimit;
  const maxPosts = opts.maxPostsPerActor ?? COLLECT.maxPostsPerActor;

  return withRetries(
    async () => {
      const posts: Post[] = [];
      for await (const post of client.fetchAllForActor(actor, pageLimit, maxPosts)) {
        if (inWindow(post, opts.window)) posts.push(post);
      }
      return posts;
    },
    { tries: COLLECT.retryTries, ...opts.retry, label: `feed:${actor}` }
  );
}

export function newestFirst(a: Post, b: Post) {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}

/**
 * Resolve actors, pull their feeds with bounded parallelism, sort newest
 * first. A rejected login aborts the run; other per-actor failures are
 * reported and the rest continue.
 */
export async function runCollector(
  client: FeedSource,
  opts: CollectOptions
): Promise<CollectResult> {
  const actors = await resolveActors(client, opts.actors, opts.searchTerms, opts.retry);
  log.info({ actors: actors.length }, "collect start");

  const limit = pLimit(opts.parallel ?? COLLECT.parallel);
  const failures: CollectResult["failures"] = [];

  const perActor = await Promise.all(
    actors.map((actor) =>
      limit(async () => {
        try {
          const posts = await collectActor(client, actor, opts);
          log.info({ actor, posts: posts.length }, "actor done");
          return posts;
        } catch (e) {
          if (e instanceof AuthenticationError) throw e;
          const error = describeError(e);
          failures.push({ actor, error });
          log.error({ actor, error }, "actor failed");
          return [];
        }
      })
    )
  );

  const posts = perActor.flat().sort(newestFirst);
  log.info({ posts: posts.length, failed: failures.length }, "collect done");
  return { actors, posts, failures };
}

const StoredPostSchema = z.object({
  actor: z.string(),
  uri: z.string(),
  cid: z.string().nullable(),
  authorDid: z.string().nullable(),
  authorHandle: z.string().nullable(),
  createdAt: z.string(),
  indexedAt: z.string().nullable(),
  text: z.string(),
  likeCount: z.number(),
  repostCount: z.number(),
  replyCount: z.number(),
  quoteCount: z.number(),
  engagement: z.number(),
  isRepost: z.boolean(),
});

/** Records already in `path`; a missing file is empty, unreadable lines are skipped. */
export async function readNdjson(path: string): Promise<Post[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }

  const posts: Post[] = [];
  text.split("\n").forEach((line, i) => {
    if (!line.trim()) return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      log.warn({ path, line: i + 1 }, "skipping malformed line");
      return;
    }
    const parsed = StoredPostSchema.safeParse(raw);
    if (parsed.success) posts.push(parsed.data);
    else log.warn({ path, line: i + 1 }, "skipping malformed line");
  });
  return posts;
}

/**
 * Merge `posts` into the NDJSON file at `path`, one record per line, newest
 * first. Records are keyed by uri and a fresh record replaces the stored one.
 * The file is replaced by a rename of a temp file beside it.
 */
export async function writeNdjson(path: string, posts: readonly Post[]) {
  await mkdir(dirname(path), { recursive: true });

  const byUri = new Map<string, Post>();
  for (const p of await readNdjson(path)) byUri.set(p.uri, p);
  for (const p of posts) byUri.set(p.uri, p);
  const merged = [...byUri.values()].sort(newestFirst);

  const body = merged.map((p) => JSON.stringify(p)).join("\n");
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, merged.length ? `${body}\n` : "", "utf8");
  await rename(tmp, path);
  return merged.length;
}

async function main() {
  try {
    const result = await runCollector(getFeedClient(), {
      actors: ENV.COLLECT_ACTORS,
      searchTerms: ENV.COLLECT_SEARCH_TERMS,
      window: parseWindow(ENV.COLLECT_SINCE, ENV.COLLECT_UNTIL),
    });
    const stored = await writeNdjson(ENV.COLLECT_OUTPUT, result.posts);
    log.info(
      {
        output: ENV.COLLECT_OUTPUT,
        posts: result.posts.length,
        stored,
        failed: result.failures.length,
      },
      "ALL DONE"
    );
    process.exit(result.failures.length > 0 ? 1 : 0);
  } catch (e) {
    const report = describeError(e);
    log.error(report, `FAILED (${report.retryable ? "safe to retry" : "do not retry"})`);
    process.exit(1);
  }
}

/** CLI runner for `npm run collect:once` */
if (require.main === module) {
  void main();
}
