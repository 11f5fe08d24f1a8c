import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { Writable } from "node:stream";
import { VERSION, createCli } from "../../src/cli/program.js";
import { MemoryDB } from "../../src/memory/db.js";
import { MemoryRecorder } from "../../src/memory/recorder.js";
import { FIXED_NOW, makeTempDir, silentLogger } from "../helpers/fakes.js";

function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

describe("leadsync CLI", () => {
  let dir: string;
  let cleanup: () => void;
  let configPath: string;
  let dbPath: string;

  async function run(...args: string[]): Promise<{ code: number; output: string }> {
    const { stream, output } = captureStdout();
    const code = await createCli().run(args, { stdout: stream, stderr: stream });
    return { code, output: output() };
  }

  function writeConfig(extra: Record<string, unknown> = {}): void {
    writeFileSync(
      configPath,
      JSON.stringify({ memory: { dbPath }, logging: { level: "silent", json: true }, ...extra }),
    );
  }

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir("leadsync-cli-"));
    process.env["LEADSYNC_STATE_DIR"] = join(dir, "state");
    configPath = join(dir, "leadsync.config.json");
    dbPath = join(dir, "memory.db");
    writeConfig();
  });

  afterEach(() => {
    delete process.env["LEADSYNC_STATE_DIR"];
    cleanup();
  });

  it("prints its version", async () => {
    expect(await run("--version")).toEqual({ code: 0, output: `${VERSION}\n` });
  });

  describe("config validate", () => {
    it("accepts a valid file", async () => {
      expect(await run("config", "validate", configPath)).toEqual({
        code: 0,
        output: `Config is valid: ${configPath}\n`,
      });
    });

    it("lists schema problems", async () => {
      writeFileSync(configPath, JSON.stringify({ server: { port: "eight thousand" } }));
      const { code, output } = await run("config", "validate", configPath);
      expect(code).toBe(1);
      expect(output.split("\n")[0]).toBe(`Config is INVALID: ${configPath}`);
      expect(output.split("\n")[1]?.startsWith("  server.port: ")).toBe(true);
    });

    it("reports a missing file", async () => {
      const missing = join(dir, "nope.json");
      expect(await run("config", "validate", missing)).toEqual({
        code: 1,
        output: `Config file not found: ${missing}\n`,
      });
    });
  });

  describe("memory rules", () => {
    it("adds and lists rules", async () => {
      expect(await run("memory", "rules", "add", "--config", configPath, "database:", "never", "drop", "columns")).toEqual({
        code: 0,
        output: "Leader rule saved (database): never drop columns\n",
      });
      expect(await run("memory", "rules", "list", "--config", configPath)).toEqual({
        code: 0,
        output: "Leader rules (1):\n  [database] never drop columns\n",
      });
      expect(await run("memory", "rules", "list", "--config", configPath, "--category", "frontend")).toEqual({
        code: 0,
        output: "No leader rules stored.\n",
      });
    });

    it("refuses an empty rule", async () => {
      expect(await run("memory", "rules", "add", "--config", configPath, "backend:")).toEqual({
        code: 1,
        output: "Failed to save rule: Rule text is empty\n",
      });
    });
  });

  describe("memory events", () => {
    it("says so when nothing was recorded", async () => {
      expect(await run("memory", "events", "--config", configPath)).toEqual({
        code: 0,
        output: "No events recorded.\n",
      });
    });

    it("lists recorded events", async () => {
      const db = new MemoryDB(dbPath);
      new MemoryRecorder(db, silentLogger(), { now: () => FIXED_NOW }).recordEvent({
        eventType: "done_scan_run",
        workflow: "done_scan",
        ticketKey: "LEADS-4",
        payload: {},
      });
      db.close();

      expect(await run("memory", "events", "--config", configPath, "--workflow", "done_scan")).toEqual({
        code: 0,
        output: "Events (1):\n  2026-03-02T10:15:00.000Z  done_scan/done_scan_run LEADS-4\n",
      });
    });

    it("rejects an unknown workflow", async () => {
      expect(await run("memory", "events", "--workflow", "nope")).toEqual({
        code: 1,
        output: "Unknown workflow: nope\n",
      });
    });

    it("validates the limit", async () => {
      const { code } = await run("memory", "events", "--config", configPath, "--limit", "0");
      expect(code).toBe(1);
    });
  });

  describe("digest run", () => {
    it("fails without a repository target", async () => {
      expect(await run("digest", "run", "--config", configPath)).toEqual({
        code: 1,
        output: "Digest failed: Missing GitHub repository target. Set github.repoOwner and github.repoName.\n",
      });
    });

    it("takes the scheduled lock for the current hour with --bucket", async () => {
      writeConfig({ github: { repoOwner: "acme", repoName: "shop" }, slack: { channelId: "C-TEST" } });

      expect(await run("digest", "run", "--config", configPath, "--bucket")).toEqual({
        code: 1,
        output: "Digest failed: Failed to list commits for acme/shop: GitHub is not configured. Set github.token.\n",
      });

      const repeat = await run("digest", "run", "--config", configPath, "--bucket");
      expect(repeat.code).toBe(0);
      const outcome: unknown = JSON.parse(repeat.output);
      expect(outcome).toMatchObject({ status: "skipped", model: null, result: { reason: "duplicate_bucket" } });
      expect(outcome).toHaveProperty(
        "result.lock_key",
        expect.stringMatching(/^digest:\d{4}-\d{2}-\d{2}T\d{2}:00:00Z:window=60:source=scheduled$/),
      );
    });

    it("reports unreadable config", async () => {
      writeFileSync(configPath, "{ not json");
      const { code, output } = await run("digest", "run", "--config", configPath);
      expect(code).toBe(1);
      expect(output.startsWith("Failed to load config: ")).toBe(true);
    });
  });
});
