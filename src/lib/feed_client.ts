import axios, { AxiosInstance, AxiosResponse } from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import { logger as rootLogger } from "./logger";
import { normalizeFeed } from "./normalize";
import {
  AuthExpiredError,
  AuthenticationError,
  FeedClientError,
  InvalidRequestError,
  ProviderError,
  RateLimitedError,
  RequestCancelledError,
  TransportError,
} from "./errors";
import { SingleFlight, buildSession, isStale, waitFor } from "./session";
import {
  AUTHOR_FEED_FILTERS,
  AuthorFeedSchema,
  CreateSessionResponse,
  CreateSessionSchema,
  SearchActorsSchema,
  XrpcErrorSchema,
} from "../types/bsky";
import type { AuthorFeedFilter } from "../types/bsky";
import type {
  ActorSummary,
  Credentials,
  FeedPage,
  FeedRequest,
  Post,
  Session,
  SessionState,
} from "../types/api";

export const DEFAULT_SERVICE_URL = "https://bsky.social";
export const PROVIDER_MAX_LIMIT = 100;

const NSID = {
  createSession: "com.atproto.server.createSession",
  refreshSession: "com.atproto.server.refreshSession",
  getAuthorFeed: "app.bsky.feed.getAuthorFeed",
  searchActors: "app.bsky.actor.searchActors",
} as const;

// 400s the provider sends for a stale or unknown access token
const EXPIRED_TOKEN_ERRORS = new Set(["ExpiredToken", "InvalidToken"]);

export type FeedClientOptions = {
  credentials: Credentials;
  serviceUrl?: string;
  authTimeoutMs?: number;
  requestTimeoutMs?: number;
  /** Assumed token lifetime when the access token carries no exp claim. */
  sessionTtlMs?: number;
  /** Treat the session as stale this long before it expires. */
  expirySkewMs?: number;
  /** Re-authenticate with refreshSession before falling back to a full login. */
  useRefreshToken?: boolean;
  logger?: Logger;
  http?: AxiosInstance;
  now?: () => number;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export type FeedOptions = RequestOptions & {
  filter?: AuthorFeedFilter;
};

const FeedRequestSchema = z.object({
  actor: z.string().trim().min(1, "actor must be a non-empty string"),
  limit: z.number().finite(),
  cursor: z.string().optional(),
  filter: z.enum(AUTHOR_FEED_FILTERS).optional(),
});

export function clampLimit(n: number, max = PROVIDER_MAX_LIMIT) {
  return Math.min(Math.max(Math.trunc(n), 1), max);
}

/** Validate a feed request; out-of-range limits are clamped, not rejected. */
export function parseFeedRequest(input: FeedRequest): FeedRequest {
  const r = FeedRequestSchema.safeParse({
    ...input,
    cursor: input.cursor || undefined,
  });
  if (!r.success) {
    throw new InvalidRequestError(
      r.error.issues
        .map((i) => `${i.path.join(".") || "request"}: ${i.message}`)
        .join("; ")
    );
  }
  return { ...r.data, limit: clampLimit(r.data.limit) };
}

/** Seconds to wait from Retry-After (seconds or HTTP date), else ratelimit-reset. */
export function parseRetryAfter(
  retryAfter: string | undefined,
  rateLimitReset: string | undefined,
  now: number
): number | undefined {
  const ra = retryAfter?.trim();
  if (ra) {
    if (/^\d+(\.\d+)?$/.test(ra)) return Math.ceil(Number(ra));
    const at = Date.parse(ra);
    if (!Number.isNaN(at)) return Math.max(0, Math.ceil((at - now) / 1000));
  }
  const reset = rateLimitReset?.trim();
  if (reset && /^\d+$/.test(reset)) {
    return Math.max(0, Number(reset) - Math.floor(now / 1000));
  }
  return undefined;
}

function header(res: AxiosResponse, name: string): string | undefined {
  const v: unknown = res.headers[name];
  if (v === undefined || v === null) return undefined;
  return Array.isArray(v) ? String(v[0]) : String(v);
}

function isOk(status: number) {
  return status >= 200 && status < 300;
}

/**
 * Authenticated client for the author-feed endpoints. Owns exactly one
 * session; every feed call goes through ensureSession().
 */
export class SessionedFeedClient {
  private readonly credentials: Credentials;
  private readonly serviceUrl: string;
  private readonly authTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly sessionTtlMs: number;
  private readonly expirySkewMs: number;
  private readonly useRefreshToken: boolean;
  private readonly log: Logger;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  private session: Session | null = null;
  private state: SessionState = "unauthenticated";
  private authFailure: AuthenticationError | null = null;
  private readonly flight = new SingleFlight<Session>();

  constructor(opts: FeedClientOptions) {
    this.credentials = { ...opts.credentials };
    this.serviceUrl = (opts.serviceUrl ?? DEFAULT_SERVICE_URL).replace(/\/+$/, "");
    this.authTimeoutMs = opts.authTimeoutMs ?? 10_000;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 15_000;
    this.sessionTtlMs = opts.sessionTtlMs ?? 2 * 60 * 60 * 1000;
    this.expirySkewMs = opts.expirySkewMs ?? 60_000;
    this.useRefreshToken = opts.useRefreshToken ?? true;
    this.log = (opts.logger ?? rootLogger).child({ module: "feed-client" });
    this.http = opts.http ?? axios.create();
    this.now = opts.now ?? Date.now;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Drop the session and any stored login failure. */
  reset() {
    this.session = null;
    this.authFailure = null;
    this.setState("unauthenticated");
  }

  /** Exchange credentials for a fresh session (createSession). */
  authenticate(): Promise<Session> {
    return this.flight.run(() => this.login());
  }

  /**
   * Current session, or one acquired on demand. Concurrent callers share a
   * single exchange; an abort only ends the caller's own wait.
   */
  async ensureSession(signal?: AbortSignal): Promise<Session> {
    if (this.state === "auth_failed" && this.authFailure) throw this.authFailure;

    const current = this.session;
    if (current && this.state === "valid") {
      if (!isStale(current, this.now(), this.expirySkewMs)) return current;
      this.setState("expired");
    }
    return waitFor(
      this.flight.run(() => this.reacquire()),
      signal
    );
  }

  async fetchAuthorFeed(
    actor: string,
    limit: number,
    cursor?: string,
    options: FeedOptions = {}
  ): Promise<FeedPage> {
    const req = parseFeedRequest({ actor, limit, cursor, filter: options.filter });
    const params: Record<string, string> = {
      actor: req.actor,
      limit: String(req.limit),
    };
    if (req.cursor) params.cursor = req.cursor;
    if (req.filter) params.filter = req.filter;

    const data = await this.authedGet(
      NSID.getAuthorFeed,
      params,
      AuthorFeedSchema,
      options.signal
    );
    const posts = normalizeFeed(data.feed, req.actor);
    this.log.debug(
      { actor: req.actor, fetched: data.feed.length, kept: posts.length },
      "author feed page"
    );
    return { posts, nextCursor: data.cursor || undefined };
  }

  /**
   * Walk an actor's feed page by page. Each call starts from the first page;
   * stops when the provider stops returning a new cursor or maxPosts is hit.
   */
  async *fetchAllForActor(
    actor: string,
    pageLimit: number,
    maxPosts?: number,
    options: FeedOptions = {}
  ): AsyncGenerator<Post, void, undefined> {
    if (maxPosts !== undefined && !(Number.isInteger(maxPosts) && maxPosts >= 0)) {
      throw new InvalidRequestError("maxPosts must be a non-negative integer");
    }
    const seen = new Set<string>();
    let cursor: string | undefined;
    let yielded = 0;

    while (maxPosts === undefined || yielded < maxPosts) {
      const want =
        maxPosts === undefined ? pageLimit : Math.min(pageLimit, maxPosts - yielded);
      const page = await this.fetchAuthorFeed(actor, want, cursor, options);
      for (const post of page.posts) {
        if (maxPosts !== undefined && yielded >= maxPosts) return;
        yield post;
        yielded++;
      }
      if (!page.nextCursor || seen.has(page.nextCursor)) return;
      seen.add(page.nextCursor);
      cursor = page.nextCursor;
    }
  }

  async searchActors(
    term: string,
    limit = 25,
    options: RequestOptions = {}
  ): Promise<ActorSummary[]> {
    const q = term.trim();
    if (!q) throw new InvalidRequestError("term must be a non-empty string");
    if (!Number.isFinite(limit)) {
      throw new InvalidRequestError("limit must be a finite number");
    }
    const data = await this.authedGet(
      NSID.searchActors,
      { q, limit: String(clampLimit(limit)) },
      SearchActorsSchema,
      options.signal
    );
    return data.actors.map((a) => ({
      did: a.did,
      handle: a.handle,
      ...(a.displayName ? { displayName: a.displayName } : {}),
    }));
  }

  // --- session lifecycle ---

  private setState(next: SessionState) {
    if (next !== this.state) {
      this.log.debug({ from: this.state, to: next }, "session state");
      this.state = next;
    }
  }

  private reacquire(): Promise<Session> {
    const refreshJwt = this.session?.refreshJwt;
    if (this.useRefreshToken && refreshJwt) return this.refresh(refreshJwt);
    return this.login();
  }

  private async login(): Promise<Session> {
    this.setState("authenticating");
    try {
      const res = await this.exchange(NSID.createSession, {
        identifier: this.credentials.identifier,
        password: this.credentials.password,
      });
      return this.accept(res);
    } catch (e) {
      this.fail(e);
      throw e;
    }
  }

  private async refresh(refreshJwt: string): Promise<Session> {
    this.setState("authenticating");
    let res: CreateSessionResponse;
    try {
      res = await this.exchange(NSID.refreshSession, undefined, refreshJwt);
    } catch (e) {
      if (!(e instanceof AuthenticationError)) {
        this.fail(e);
        throw e;
      }
      this.log.info({ status: e.status }, "refresh rejected, logging in again");
      return this.login();
    }
    return this.accept(res);
  }

  private accept(res: CreateSessionResponse): Session {
    const session = buildSession(res, this.now(), this.sessionTtlMs);
    this.session = session;
    this.authFailure = null;
    this.setState("valid");
    this.log.info({ handle: session.handle }, "session established");
    return session;
  }

  private fail(e: unknown) {
    this.session = null;
    if (e instanceof AuthenticationError) {
      this.authFailure = e;
      this.setState("auth_failed");
    } else {
      this.setState("unauthenticated");
    }
  }

  /** Mark `used` expired, unless another caller already replaced it. */
  private invalidate(used: Session) {
    if (this.session === used && this.state === "valid") {
      this.setState("expired");
    }
  }

  private async exchange(
    nsid: string,
    body: Credentials | undefined,
    bearer?: string
  ): Promise<CreateSessionResponse> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.post<unknown>(this.url(nsid), body, {
        timeout: this.authTimeoutMs,
        headers: bearer ? { Authorization: `Bearer ${bearer}` } : undefined,
        validateStatus: () => true,
      });
    } catch (e) {
      throw this.networkFailure(e, nsid);
    }

    if (res.status === 429) {
      throw new RateLimitedError(
        `${nsid} rate limited`,
        parseRetryAfter(header(res, "retry-after"), header(res, "ratelimit-reset"), this.now())
      );
    }
    if (!isOk(res.status)) {
      const detail = XrpcErrorSchema.safeParse(res.data);
      const reason = detail.success ? detail.data.error ?? detail.data.message : undefined;
      throw new AuthenticationError(
        `${nsid} rejected (HTTP ${res.status}${reason ? `, ${reason}` : ""})`,
        res.status
      );
    }
    const parsed = CreateSessionSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new AuthenticationError(`${nsid} response has no accessJwt`, res.status);
    }
    return parsed.data;
  }

  // --- authenticated requests ---

  /** GET with the session token; one re-authentication and retry on expiry. */
  private async authedGet<T>(
    nsid: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const session = await this.ensureSession(signal);
    try {
      return await this.get(nsid, params, schema, session, signal);
    } catch (e) {
      if (!(e instanceof AuthExpiredError)) throw e;
      this.invalidate(session);
      this.log.info({ nsid, status: e.status }, "token rejected, re-authenticating");
    }

    const fresh = await this.ensureSession(signal);
    try {
      return await this.get(nsid, params, schema, fresh, signal);
    } catch (e) {
      if (e instanceof AuthExpiredError) this.invalidate(fresh);
      throw e;
    }
  }

  private async get<T>(
    nsid: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    session: Session,
    signal?: AbortSignal
  ): Promise<T> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.get<unknown>(this.url(nsid), {
        params,
        headers: { Authorization: `Bearer ${session.accessJwt}` },
        timeout: this.requestTimeoutMs,
        signal,
        validateStatus: () => true,
      });
    } catch (e) {
      throw this.networkFailure(e, nsid);
    }

    if (isOk(res.status)) {
      const parsed = schema.safeParse(res.data);
      if (!parsed.success) {
        throw new ProviderError(`${nsid} returned an unexpected payload`, res.status, res.data);
      }
      return parsed.data;
    }
    throw this.classify(nsid, res);
  }

  private classify(nsid: string, res: AxiosResponse<unknown>): FeedClientError {
    const { status } = res;
    if (status === 401 || status === 403) {
      return new AuthExpiredError(`${nsid} rejected the session (HTTP ${status})`, status);
    }
    if (status === 429) {
      return new RateLimitedError(
        `${nsid} rate limited`,
        parseRetryAfter(header(res, "retry-after"), header(res, "ratelimit-reset"), this.now())
      );
    }
    const detail = XrpcErrorSchema.safeParse(res.data);
    const code = detail.success ? detail.data.error : undefined;
    if (status === 400 && code && EXPIRED_TOKEN_ERRORS.has(code)) {
      return new AuthExpiredError(`${nsid} rejected the session (${code})`, status);
    }
    return new ProviderError(`${nsid} failed (HTTP ${status})`, status, res.data);
  }

  private networkFailure(e: unknown, nsid: string): FeedClientError {
    if (axios.isCancel(e)) return new RequestCancelledError(`${nsid} cancelled`);
    if (axios.isAxiosError(e)) {
      const timedOut = e.code === "ECONNABORTED" || e.code === "ETIMEDOUT";
      return new TransportError(
        timedOut ? `${nsid} timed out` : `${nsid} failed (${e.code ?? e.message})`,
        e.code
      );
    }
    const msg = e instanceof Error ? e.message : String(e);
    return new TransportError(`${nsid} failed (${msg})`);
  }

  private url(nsid: string) {
    return `${this.serviceUrl}/xrpc/${nsid}`;
  }
}
