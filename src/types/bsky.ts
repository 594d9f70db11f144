import { z } from "zod";

// Only the fields we read; the provider sends much more and we let it through.

export const CreateSessionSchema = z
  .object({
    accessJwt: z.string().min(1),
    refreshJwt: z.string().min(1).optional(),
    did: z.string().optional(),
    handle: z.string().optional(),
  })
  .passthrough();

export type CreateSessionResponse = z.infer<typeof CreateSessionSchema>;

export const PostRecordSchema = z
  .object({
    text: z.string().optional(),
    createdAt: z.string().optional(),
  })
  .passthrough();

export const PostViewSchema = z
  .object({
    uri: z.string(),
    cid: z.string().optional(),
    author: z
      .object({ did: z.string(), handle: z.string() })
      .passthrough()
      .optional(),
    record: PostRecordSchema.optional(),
    indexedAt: z.string().optional(),
    likeCount: z.number().optional(),
    repostCount: z.number().optional(),
    replyCount: z.number().optional(),
    quoteCount: z.number().optional(),
  })
  .passthrough();

export type PostView = z.infer<typeof PostViewSchema>;

export const FeedViewPostSchema = z
  .object({
    post: PostViewSchema.optional(),
    reason: z.object({ $type: z.string() }).passthrough().optional(),
  })
  .passthrough();

export type FeedViewPost = z.infer<typeof FeedViewPostSchema>;

export const AuthorFeedSchema = z.object({
  cursor: z.string().optional(),
  feed: z.array(z.unknown()),
});

export type AuthorFeedResponse = z.infer<typeof AuthorFeedSchema>;

export const SearchActorsSchema = z.object({
  cursor: z.string().optional(),
  actors: z.array(
    z
      .object({
        did: z.string(),
        handle: z.string(),
        displayName: z.string().optional(),
      })
      .passthrough()
  ),
});

export type SearchActorsResponse = z.infer<typeof SearchActorsSchema>;

/** XRPC error envelope: `{ error, message }`. */
export const XrpcErrorSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export const REPOST_REASON = "app.bsky.feed.defs#reasonRepost";

export const AUTHOR_FEED_FILTERS = [
  "posts_with_replies",
  "posts_no_replies",
  "posts_with_media",
  "posts_and_author_threads",
] as const;

export type AuthorFeedFilter = (typeof AUTHOR_FEED_FILTERS)[number];
