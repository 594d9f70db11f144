import { ENV, must } from "./env";
import { SessionedFeedClient } from "./feed_client";

let client: SessionedFeedClient | null = null;

/** Process-wide client built from env credentials (jobs + server only). */
export function getFeedClient(): SessionedFeedClient {
  if (!client) {
    client = new SessionedFeedClient({
      credentials: {
        identifier: must("BSKY_IDENTIFIER"),
        password: must("BSKY_APP_PASSWORD"), // app password, keep this ONLY on server
      },
      serviceUrl: ENV.BSKY_SERVICE_URL,
    });
  }
  return client;
}
