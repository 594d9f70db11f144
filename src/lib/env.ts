import * as dotenv from "dotenv";
dotenv.config();

/** Read a required env var; jobs call this lazily so tests never need it. */
export function must(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

function list(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: process.env.LOG_LEVEL ?? "",
  PORT: Number(process.env.PORT ?? 4000),
  BSKY_SERVICE_URL: process.env.BSKY_SERVICE_URL ?? "https://bsky.social",
  ADMIN_TOKEN: process.env.ADMIN_TOKEN ?? "",
  COLLECT_ACTORS: list(process.env.COLLECT_ACTORS),
  COLLECT_SEARCH_TERMS: list(process.env.COLLECT_SEARCH_TERMS),
  COLLECT_OUTPUT: process.env.COLLECT_OUTPUT ?? "out/posts.ndjson",
  COLLECT_CRON: process.env.COLLECT_CRON ?? "*/30 * * * *",
  COLLECT_SINCE: process.env.COLLECT_SINCE ?? "", // YYYY-MM-DD or ISO
  COLLECT_UNTIL: process.env.COLLECT_UNTIL ?? "",
};
