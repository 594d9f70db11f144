import { FeedViewPostSchema, REPOST_REASON } from "../types/bsky";
import type { Post } from "../types/api";

function count(n: number | undefined): number {
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? n : 0;
}

/**
 * Turn one feed envelope into a Post. Returns null for envelopes without a
 * post record or with an unparseable createdAt; those are skipped, not fatal.
 */
export function normalizePost(item: unknown, actor: string): Post | null {
  const parsed = FeedViewPostSchema.safeParse(item);
  if (!parsed.success) return null;
  const { post, reason } = parsed.data;
  if (!post || !post.record) return null;

  const createdMs = Date.parse(post.record.createdAt ?? "");
  if (Number.isNaN(createdMs)) return null;

  const likeCount = count(post.likeCount);
  const repostCount = count(post.repostCount);
  const replyCount = count(post.replyCount);
  const quoteCount = count(post.quoteCount);

  return Object.freeze({
    actor,
    uri: post.uri,
    cid: post.cid ?? null,
    authorDid: post.author?.did ?? null,
    authorHandle: post.author?.handle ?? null,
    createdAt: new Date(createdMs).toISOString(),
    indexedAt: post.indexedAt ?? null,
    text: (post.record.text ?? "").trim(),
    likeCount,
    repostCount,
    replyCount,
    quoteCount,
    engagement: likeCount + repostCount + replyCount + quoteCount,
    isRepost: reason?.$type === REPOST_REASON,
  });
}

export function normalizeFeed(items: unknown[], actor: string): Post[] {
  const out: Post[] = [];
  for (const item of items) {
    const p = normalizePost(item, actor);
    if (p) out.push(p);
  }
  return out;
}
