import { describe, it, expect } from "@jest/globals";
import { ENV } from "../env";
import { logger } from "../logger";

describe("logger", () => {
  it("takes its level from the loaded environment", () => {
    expect(ENV.NODE_ENV).toBe("test");
    expect(logger.level).toBe(ENV.LOG_LEVEL || "silent");
  });
});
