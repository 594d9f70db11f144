import { z } from "zod";
import { RequestCancelledError } from "./errors";
import type { CreateSessionResponse } from "../types/bsky";
import type { Session } from "../types/api";

const JwtClaimsSchema = z.object({ exp: z.number() }).passthrough();

/** `exp` claim in epoch ms, or undefined when the token isn't a readable JWT. */
export function tokenExpiry(token: string): number | undefined {
  const parts = token.split(".");
  if (parts.length !== 3) return undefined;
  try {
    const json: unknown = JSON.parse(
      Buffer.from(parts[1], "base64url").toString("utf8")
    );
    const claims = JwtClaimsSchema.safeParse(json);
    return claims.success ? claims.data.exp * 1000 : undefined;
  } catch {
    // opaque token: caller falls back to the assumed TTL
    return undefined;
  }
}

export function buildSession(
  res: CreateSessionResponse,
  now: number,
  ttlMs: number
): Session {
  return {
    accessJwt: res.accessJwt,
    refreshJwt: res.refreshJwt,
    did: res.did,
    handle: res.handle,
    issuedAt: now,
    expiresAt: tokenExpiry(res.accessJwt) ?? now + ttlMs,
  };
}

export function isStale(session: Session, now: number, skewMs: number) {
  return now >= session.expiresAt - skewMs;
}

/**
 * One in-flight execution serves every concurrent caller. The slot clears
 * once the shared promise settles, so the next call starts fresh.
 */
export class SingleFlight<T> {
  private inflight: Promise<T> | null = null;

  get busy() {
    return this.inflight !== null;
  }

  run(fn: () => Promise<T>): Promise<T> {
    if (this.inflight) return this.inflight;
    const p = fn().finally(() => {
      if (this.inflight === p) this.inflight = null;
    });
    this.inflight = p;
    return p;
  }
}

/** Stop waiting on `p` when `signal` aborts; `p` itself keeps running. */
export function waitFor<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  if (signal.aborted) return Promise.reject(new RequestCancelledError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}
