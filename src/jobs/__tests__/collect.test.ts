import { describe, it, expect } from "@jest/globals";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { SessionedFeedClient } from "../../lib/feed_client";
import { AuthenticationError } from "../../lib/errors";
import {
  CREDS,
  FakeProvider,
  Handler,
  failure,
  page,
  sessionReply,
} from "../../lib/__tests__/fake_provider";
import {
  collectActor,
  inWindow,
  parseWindow,
  readNdjson,
  resolveActors,
  runCollector,
  writeNdjson,
} from "../collect";
import type { Post } from "../../types/api";

const CREATE = "com.atproto.server.createSession";
const SEARCH = "app.bsky.actor.searchActors";
const noWait = { wait: async () => undefined, random: () => 0 };

function setup(handler: Handler) {
  const provider = new FakeProvider((call, i) =>
    call.nsid === CREATE ? sessionReply(1) : handler(call, i)
  );
  const client = new SessionedFeedClient({ credentials: CREDS, http: provider.http });
  return { provider, client };
}

function uriOf(i: number) {
  return `at://did:plc:author/app.bsky.feed.post/${i}`;
}

describe("parseWindow", () => {
  it("expands date-only bounds to the whole UTC day", () => {
    expect(parseWindow("2024-01-01", "2024-01-31")).toEqual({
      since: Date.UTC(2024, 0, 1),
      until: Date.UTC(2024, 0, 31, 23, 59, 59, 999),
    });
  });

  it("accepts full timestamps and missing bounds", () => {
    expect(parseWindow("2024-01-01T06:00:00Z", "")).toEqual({ since: Date.UTC(2024, 0, 1, 6) });
    expect(parseWindow()).toEqual({});
  });

  it("rejects bad or reversed bounds", () => {
    expect(() => parseWindow("someday")).toThrow("Invalid since date: someday");
    expect(() => parseWindow("2024-02-01", "2024-01-01")).toThrow(
      "Empty date window: 2024-02-01 > 2024-01-01"
    );
  });
});

describe("inWindow", () => {
  const post: Post = {
    actor: "a.bsky.social",
    uri: uriOf(5),
    cid: null,
    authorDid: null,
    authorHandle: null,
    createdAt: "2024-01-01T00:05:00.000Z",
    indexedAt: null,
    text: "",
    likeCount: 0,
    repostCount: 0,
    replyCount: 0,
    quoteCount: 0,
    engagement: 0,
    isRepost: false,
  };

  it("is inclusive on both ends", () => {
    const t = Date.parse(post.createdAt);
    expect(inWindow(post, { since: t, until: t })).toBe(true);
    expect(inWindow(post, { since: t + 1 })).toBe(false);
    expect(inWindow(post, { until: t - 1 })).toBe(false);
    expect(inWindow(post)).toBe(true);
  });
});

describe("resolveActors", () => {
  it("appends the top search hit per term and drops duplicates", async () => {
    const { provider, client } = setup((call) => {
      const q = call.params.q;
      if (q === "economist") {
        return {
          status: 200,
          data: { actors: [{ did: "did:plc:e", handle: "economist.bsky.social" }] },
        };
      }
      if (q === "bloomberg") {
        return {
          status: 200,
          data: { actors: [{ did: "did:plc:b", handle: "business.bsky.social" }] },
        };
      }
      return { status: 200, data: { actors: [] } };
    });

    const actors = await resolveActors(
      client,
      ["business.bsky.social", " "],
      ["economist", "bloomberg", "nothing"],
      noWait
    );

    expect(actors).toEqual(["business.bsky.social", "economist.bsky.social"]);
    expect(provider.callsTo(SEARCH).map((c) => c.params)).toEqual([
      { q: "economist", limit: "1" },
      { q: "bloomberg", limit: "1" },
      { q: "nothing", limit: "1" },
    ]);
  });

  it("treats handles that differ only in case as one actor", async () => {
    const { client } = setup(() => ({
      status: 200,
      data: { actors: [{ did: "did:plc:e", handle: "economist.bsky.social" }] },
    }));

    await expect(
      resolveActors(client, ["Economist.bsky.social"], ["economist"], noWait)
    ).resolves.toEqual(["economist.bsky.social"]);
  });

  it("skips a term whose search fails", async () => {
    const { client } = setup((call) =>
      call.params.q === "broken"
        ? { status: 400, data: { error: "InvalidRequest" } }
        : { status: 200, data: { actors: [{ did: "did:plc:x", handle: "x.bsky.social" }] } }
    );

    await expect(resolveActors(client, [], ["broken", "fine"], noWait)).resolves.toEqual([
      "x.bsky.social",
    ]);
  });
});

describe("collectActor", () => {
  it("re-walks the feed from the first page after a transient failure", async () => {
    let feedCalls = 0;
    const { provider, client } = setup((call) => {
      feedCalls++;
      if (feedCalls === 2) return { networkError: "ECONNRESET" };
      return call.params.cursor ? page([2]) : page([1], "c1");
    });

    const posts = await collectActor(client, "a.bsky.social", { pageLimit: 5, retry: noWait });

    expect(posts.map((p) => p.uri)).toEqual([uriOf(1), uriOf(2)]);
    expect(provider.callsTo("app.bsky.feed.getAuthorFeed").map((c) => c.params.cursor)).toEqual([
      undefined,
      "c1",
      undefined,
      "c1",
    ]);
  });
});

describe("runCollector", () => {
  const feeds: Handler = (call) => {
    switch (call.params.actor) {
      case "a.bsky.social":
        return page([1, 3]);
      case "b.bsky.social":
        return page([2, 4]);
      default:
        return { status: 400, data: { error: "InvalidRequest", message: "Profile not found" } };
    }
  };

  it("merges actors newest first and reports per-actor failures", async () => {
    const { client } = setup(feeds);

    const result = await runCollector(client, {
      actors: ["a.bsky.social", "b.bsky.social", "gone.bsky.social"],
      searchTerms: [],
      retry: noWait,
    });

    expect(result.actors).toEqual(["a.bsky.social", "b.bsky.social", "gone.bsky.social"]);
    expect(result.posts.map((p) => [p.actor, p.uri])).toEqual([
      ["b.bsky.social", uriOf(4)],
      ["a.bsky.social", uriOf(3)],
      ["b.bsky.social", uriOf(2)],
      ["a.bsky.social", uriOf(1)],
    ]);
    expect(result.failures).toEqual([
      {
        actor: "gone.bsky.social",
        error: {
          code: "PROVIDER_ERROR",
          message: "app.bsky.feed.getAuthorFeed failed (HTTP 400)",
          retryable: false,
        },
      },
    ]);
  });

  it("keeps only posts inside the date window", async () => {
    const { client } = setup(feeds);

    const result = await runCollector(client, {
      actors: ["a.bsky.social", "b.bsky.social"],
      searchTerms: [],
      window: { since: Date.UTC(2024, 0, 1, 0, 2), until: Date.UTC(2024, 0, 1, 0, 3) },
      retry: noWait,
    });

    expect(result.posts.map((p) => p.uri)).toEqual([uriOf(3), uriOf(2)]);
  });

  it("aborts the run when the login is rejected", async () => {
    const provider = new FakeProvider(() => ({ status: 401 }));
    const client = new SessionedFeedClient({ credentials: CREDS, http: provider.http });

    await failure(
      runCollector(client, { actors: ["a.bsky.social"], searchTerms: [], retry: noWait }),
      AuthenticationError
    );
  });
});

describe("writeNdjson", () => {
  it("writes one JSON record per line, newest first", async () => {
    const dir = await mkdtemp(join(tmpdir(), "collect-"));
    try {
      const { client } = setup(() => page([1, 2]));
      const posts = await collectActor(client, "a.bsky.social", { retry: noWait });
      const file = join(dir, "nested", "posts.ndjson");

      await expect(writeNdjson(file, posts)).resolves.toBe(2);

      const lines = (await readFile(file, "utf8")).split("\n");
      expect(lines).toHaveLength(3);
      expect(lines[2]).toBe("");
      expect(JSON.parse(lines[0])).toEqual(posts[1]);
      expect(JSON.parse(lines[1]).uri).toBe(uriOf(1));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("merges later runs into the file by uri, keeping the fresh record", async () => {
    const dir = await mkdtemp(join(tmpdir(), "collect-"));
    try {
      const file = join(dir, "posts.ndjson");
      const { client } = setup(() => page([1, 2, 3]));
      const [p1, p2, p3] = await collectActor(client, "a.bsky.social", { retry: noWait });

      await writeNdjson(file, [p1, p2]);
      const updated: Post = { ...p2, likeCount: 50, engagement: 51 };
      await expect(writeNdjson(file, [updated, p3])).resolves.toBe(3);

      const stored = await readNdjson(file);
      expect(stored.map((p) => p.uri)).toEqual([uriOf(3), uriOf(2), uriOf(1)]);
      expect(stored[1]).toEqual(updated);
      expect(await readdir(dir)).toEqual(["posts.ndjson"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("skips malformed lines already in the file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "collect-"));
    try {
      const file = join(dir, "posts.ndjson");
      const { client } = setup(() => page([1]));
      const [p1] = await collectActor(client, "a.bsky.social", { retry: noWait });
      await writeFile(file, `not json\n{"uri":"x"}\n${JSON.stringify(p1)}\n`, "utf8");

      await expect(readNdjson(file)).resolves.toEqual([p1]);
      await expect(readNdjson(join(dir, "missing.ndjson"))).resolves.toEqual([]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
