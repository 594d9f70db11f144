import cron from "node-cron";
import { exec } from "child_process";
import { ENV } from "./lib/env";
import { logger } from "./lib/logger";

// each run is its own process
function run(script: string) {
  return new Promise<void>((resolve) => {
    exec(`npm run ${script}`, { env: process.env }, (err, stdout, stderr) => {
      if (err) {
        logger.warn({ script, code: err.code, output: stderr || stdout }, "FAIL");
      } else {
        logger.info({ script }, "OK");
      }
      resolve();
    });
  });
}

if (!cron.validate(ENV.COLLECT_CRON)) {
  logger.error({ cron: ENV.COLLECT_CRON }, "invalid COLLECT_CRON");
  process.exit(1);
}

logger.info({ cron: ENV.COLLECT_CRON }, "collector scheduler starting");

let running = false;
cron.schedule(ENV.COLLECT_CRON, async () => {
  if (running) {
    logger.warn("previous collect still running, skipping tick");
    return;
  }
  running = true;
  try {
    await run("collect:once");
  } finally {
    running = false;
  }
});

// keep process alive
process.stdin.resume();
