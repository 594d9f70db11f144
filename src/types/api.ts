import type { AuthorFeedFilter } from "./bsky";

export type Credentials = {
  identifier: string;
  password: string;
};

export type Session = {
  accessJwt: string;
  refreshJwt?: string;
  did?: string;
  handle?: string;
  issuedAt: number; // epoch ms
  expiresAt: number; // epoch ms, from the token's exp claim or an assumed TTL
};

export type SessionState =
  | "unauthenticated"
  | "authenticating"
  | "valid"
  | "expired"
  | "auth_failed";

export type FeedRequest = {
  actor: string;
  limit: number;
  cursor?: string;
  filter?: AuthorFeedFilter;
};

/** Normalized post record handed to downstream analysis. */
export type Post = {
  actor: string; // the actor whose feed we read
  uri: string;
  cid: string | null;
  authorDid: string | null;
  authorHandle: string | null;
  createdAt: string; // ISO
  indexedAt: string | null;
  text: string;
  likeCount: number;
  repostCount: number;
  replyCount: number;
  quoteCount: number;
  engagement: number;
  isRepost: boolean;
};

export type FeedPage = {
  posts: readonly Post[];
  nextCursor?: string;
};

export type ActorSummary = {
  did: string;
  handle: string;
  displayName?: string;
};

/** GET /v1/feed payload */
export type FeedResponse = {
  items: readonly Post[];
  next_cursor: string | null; // pass this as ?cursor=... for the next page
};
