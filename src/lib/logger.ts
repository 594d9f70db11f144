import pino from "pino";
import { ENV } from "./env";

const isDev = ENV.NODE_ENV !== "production" && ENV.NODE_ENV !== "test";

// Never let credentials or bearer tokens reach a log line.
const redact = [
  "password",
  "*.password",
  "accessJwt",
  "*.accessJwt",
  "refreshJwt",
  "*.refreshJwt",
  "req.headers.authorization",
  "headers.Authorization",
];

export const logger = pino({
  level: ENV.LOG_LEVEL || (ENV.NODE_ENV === "test" ? "silent" : "info"),
  redact,
  ...(isDev
    ? {
        transport: {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard" },
        },
      }
    : {}),
});
