import express from "express";
import pinoHttp from "pino-http";
import { ENV } from "./lib/env";
import { logger } from "./lib/logger";
import { feedRouter } from "./routes/feed";
import { healthRouter } from "./routes/health";
import { adminRouter } from "./routes/admin";

const app = express();
const host = "0.0.0.0";

app.use(pinoHttp({ logger }));

app.get("/", (_req, res) => {
  res.send("Skyline collector is running");
});

app.use("/health", healthRouter);
app.use("/v1", feedRouter);
app.use("/admin", adminRouter);

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "UNHANDLED_REJECTION");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "UNCAUGHT_EXCEPTION");
});

app.listen(ENV.PORT, host, () => {
  logger.info(
    {
      port: ENV.PORT,
      serviceUrl: ENV.BSKY_SERVICE_URL,
      hasIdentifier: !!process.env.BSKY_IDENTIFIER,
      hasAppPassword: !!process.env.BSKY_APP_PASSWORD,
      hasAdminToken: !!ENV.ADMIN_TOKEN,
    },
    "collector API listening"
  );
});
