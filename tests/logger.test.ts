import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../src/shared/logger.js";

describe("createLogger", () => {
  it("accepts any caller metadata and errors at every level", () => {
    const logger = createLogger({ level: "silent" });
    expect(() => {
      logger.debug("compiled", { templateId: "greeting", durationMs: 3 });
      logger.info("saved", { path: "logo.png", bytes: 12 });
      logger.warn("replaced", { characters: "✓" });
      logger.error(new Error("boom"), { templateId: "greeting" });
      logger.error("failed");
    }).not.toThrow();
  });
});

describe("silentLogger", () => {
  it("discards everything", () => {
    expect(silentLogger.warn("ignored", { any: 1 })).toBeUndefined();
  });
});
