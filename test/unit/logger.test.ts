import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("defaults to info", () => {
    expect(createLogger({ level: "info", json: true }).level).toBe("info");
  });

  it("uses the configured level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
    expect(createLogger({ level: "silent", json: true }).level).toBe("silent");
  });

  it("keeps the level on child loggers", () => {
    const child = createLogger({ level: "warn", json: true }).child({ workflow: "daily_digest" });
    expect(child.level).toBe("warn");
    expect(child.bindings()).toMatchObject({ workflow: "daily_digest" });
  });
});
