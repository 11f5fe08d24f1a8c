import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath, getStateDir, resolveMemoryDbPath, resolveTemplatesDir } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";
import { makeTempDir } from "../helpers/fakes.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-secret";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe("token: test-secret");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}")).toBe("test-secret:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow("Missing environment variable: MISSING_VAR");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.server.port).toBe(8000);
    expect(config.server.hostname).toBe("127.0.0.1");
    expect(config.model.name).toBe("gemini-2.5-flash");
    expect(config.model.fallbacks).toEqual({ "gemini-2.5-flash-lite": "gemini-2.5-flash" });
    expect(config.digest).toEqual({ windowMinutes: 60, idempotency: true, timezone: "UTC" });
    expect(config.github.branch).toBe("main");
    expect(config.artifacts.dir).toBe("artifacts");
  });

  it("parses a full config", () => {
    const config = parseConfig({
      server: { port: 8080, triggerToken: "test-secret" },
      github: { repoOwner: "acme", repoName: "shop" },
      docs: { preferenceDocs: { database: "doc-db" } },
      digest: { schedule: "0 * * * *", windowMinutes: 1440 },
    });
    expect(config.server.port).toBe(8080);
    expect(config.server.triggerToken).toBe("test-secret");
    expect(config.github.repoOwner).toBe("acme");
    expect(config.docs.preferenceDocs.database).toBe("doc-db");
    expect(config.digest.windowMinutes).toBe(1440);
  });

  it("rejects a non-positive digest window", () => {
    expect(() => parseConfig({ digest: { windowMinutes: 0 } })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logging: { level: "loud" } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir("leadsync-config-"));
    process.env["TEST_REPO_OWNER"] = "acme";
  });

  afterEach(() => {
    delete process.env["TEST_REPO_OWNER"];
    cleanup();
  });

  it("returns defaults when the file does not exist", () => {
    expect(loadConfig(join(dir, "missing.json")).server.port).toBe(8000);
  });

  it("reads JSON with env references", () => {
    const path = join(dir, "leadsync.config.json");
    writeFileSync(path, JSON.stringify({ github: { repoOwner: "${env:TEST_REPO_OWNER}", repoName: "shop" } }));
    const config = loadConfig(path);
    expect(config.github.repoOwner).toBe("acme");
    expect(config.github.repoName).toBe("shop");
  });

  it("fails on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(SyntaxError);
  });
});

describe("paths", () => {
  afterEach(() => {
    delete process.env["LEADSYNC_STATE_DIR"];
    delete process.env["LEADSYNC_CONFIG_PATH"];
  });

  it("honors environment overrides", () => {
    process.env["LEADSYNC_STATE_DIR"] = "/tmp/leadsync-state";
    process.env["LEADSYNC_CONFIG_PATH"] = "/tmp/leadsync.json";
    expect(getStateDir()).toBe("/tmp/leadsync-state");
    expect(getConfigPath()).toBe("/tmp/leadsync.json");
  });

  it("places the memory store in the state dir unless configured", () => {
    expect(resolveMemoryDbPath(parseConfig({}), "/state")).toBe(join("/state", "leadsync.db"));
    expect(resolveMemoryDbPath(parseConfig({ memory: { dbPath: "/data/m.db" } }), "/state")).toBe("/data/m.db");
  });

  it("finds the bundled templates", () => {
    expect(resolveTemplatesDir(parseConfig({})).endsWith("templates")).toBe(true);
    expect(resolveTemplatesDir(parseConfig({ templates: { dir: "/srv/templates" } }))).toBe("/srv/templates");
  });
});
