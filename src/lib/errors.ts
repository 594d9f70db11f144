export type FeedErrorCode =
  | "AUTH_REJECTED"
  | "AUTH_EXPIRED"
  | "RATE_LIMITED"
  | "PROVIDER_ERROR"
  | "TRANSPORT_ERROR"
  | "CANCELLED"
  | "INVALID_REQUEST";

const MAX_BODY_CHARS = 500;

/** Base class so callers can branch on `code` / `retryable` without instanceof chains. */
export class FeedClientError extends Error {
  constructor(
    message: string,
    public readonly code: FeedErrorCode,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = "FeedClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Provider rejected the credentials, or answered without a token. */
export class AuthenticationError extends FeedClientError {
  constructor(message: string, public readonly status?: number) {
    super(message, "AUTH_REJECTED", false);
    this.name = "AuthenticationError";
  }
}

export class AuthExpiredError extends FeedClientError {
  constructor(message: string, public readonly status?: number) {
    super(message, "AUTH_EXPIRED", true);
    this.name = "AuthExpiredError";
  }
}

export class RateLimitedError extends FeedClientError {
  constructor(message: string, public readonly retryAfterSeconds?: number) {
    super(message, "RATE_LIMITED", true);
    this.name = "RateLimitedError";
  }
}

export class ProviderError extends FeedClientError {
  public readonly body: string;

  constructor(message: string, public readonly status: number, body: unknown) {
    super(message, "PROVIDER_ERROR", status >= 500);
    this.name = "ProviderError";
    this.body = truncateBody(body);
  }
}

/**
 * DNS, connection reset, timeout. Only the network error code is kept: the
 * underlying request config carries the bearer token.
 */
export class TransportError extends FeedClientError {
  constructor(message: string, public readonly networkCode?: string) {
    super(message, "TRANSPORT_ERROR", true);
    this.name = "TransportError";
  }
}

export class RequestCancelledError extends FeedClientError {
  constructor(message = "Request cancelled by caller") {
    super(message, "CANCELLED", false);
    this.name = "RequestCancelledError";
  }
}

export class InvalidRequestError extends FeedClientError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST", false);
    this.name = "InvalidRequestError";
  }
}

export function truncateBody(body: unknown): string {
  if (body === undefined || body === null) return "";
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return text.length > MAX_BODY_CHARS ? text.slice(0, MAX_BODY_CHARS) : text;
}

export type ErrorReport = {
  code: FeedErrorCode | "UNKNOWN";
  message: string;
  retryable: boolean;
};

/** Shape used by the CLI and HTTP surfaces to report a failure. */
export function describeError(e: unknown): ErrorReport {
  if (e instanceof FeedClientError) {
    return { code: e.code, message: e.message, retryable: e.retryable };
  }
  const message = e instanceof Error ? e.message : String(e);
  return { code: "UNKNOWN", message, retryable: false };
}

/** HTTP status the API surface answers with for a client failure. */
export function httpStatusFor(e: unknown): number {
  if (!(e instanceof FeedClientError)) return 500;
  switch (e.code) {
    case "INVALID_REQUEST":
      return 400;
    case "RATE_LIMITED":
      return 429;
    case "TRANSPORT_ERROR":
      return 504;
    case "CANCELLED":
      return 499;
    default:
      return 502; // upstream rejected us: credentials, session or provider
  }
}
