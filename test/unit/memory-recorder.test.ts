import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MemoryDB } from "../../src/memory/db.js";
import { MemoryRecorder, isUniqueViolation } from "../../src/memory/recorder.js";
import { MemoryQuery } from "../../src/memory/query.js";
import { silentLogger } from "../helpers/fakes.js";

const NOW = new Date("2026-03-02T10:00:00Z");

describe("MemoryRecorder", () => {
  let db: MemoryDB;
  let recorder: MemoryRecorder;
  let query: MemoryQuery;

  beforeEach(() => {
    db = new MemoryDB(":memory:");
    recorder = new MemoryRecorder(db, silentLogger(), { now: () => NOW });
    query = new MemoryQuery(db, silentLogger(), () => NOW);
  });

  afterEach(() => {
    db.close();
  });

  it("records an event with its payload and timestamp", () => {
    recorder.recordEvent({
      eventType: "ticket_enrichment_run",
      workflow: "ticket_enrichment",
      ticketKey: "LEADS-1",
      projectKey: "LEADS",
      label: "backend",
      payload: { model: "gemini-2.5-flash" },
    });

    const [event] = query.recentEvents();
    expect(event).toMatchObject({
      eventType: "ticket_enrichment_run",
      workflow: "ticket_enrichment",
      ticketKey: "LEADS-1",
      projectKey: "LEADS",
      label: "backend",
      component: null,
      payload: { model: "gemini-2.5-flash" },
      createdAt: "2026-03-02T10:00:00.000Z",
    });
  });

  it("records a memory item with nullable fields defaulted", () => {
    recorder.recordMemoryItem({
      itemType: "leader_rule",
      workflow: "leader_rules",
      label: "general",
      summary: "Prefer small PRs",
    });

    const [item] = query.leaderRules();
    expect(item).toMatchObject({
      itemType: "leader_rule",
      summary: "Prefer small PRs",
      decision: null,
      context: null,
      ticketKey: null,
    });
  });

  it("swallows store failures", () => {
    db.close();
    const broken = new MemoryRecorder(new MemoryDB("/dev/null/not-a-dir/x.db"), silentLogger());
    expect(() =>
      broken.recordEvent({ eventType: "pr_linked", workflow: "pr_link", payload: {} }),
    ).not.toThrow();
    expect(() =>
      broken.recordMemoryItem({ itemType: "slack_qa", workflow: "slack_qa", summary: "q" }),
    ).not.toThrow();
  });

  describe("acquireIdempotencyLock", () => {
    it("grants a lock once per workflow and key", () => {
      expect(recorder.acquireIdempotencyLock("daily_digest", "digest:2026-03-02T10:00:00Z")).toBe(true);
      expect(recorder.acquireIdempotencyLock("daily_digest", "digest:2026-03-02T10:00:00Z")).toBe(false);
    });

    it("keys are independent across workflows and keys", () => {
      expect(recorder.acquireIdempotencyLock("daily_digest", "a")).toBe(true);
      expect(recorder.acquireIdempotencyLock("daily_digest", "b")).toBe(true);
      expect(recorder.acquireIdempotencyLock("done_scan", "a")).toBe(true);
    });

    it("proceeds when the store cannot be opened", () => {
      const broken = new MemoryRecorder(new MemoryDB("/dev/null/not-a-dir/x.db"), silentLogger());
      expect(broken.acquireIdempotencyLock("daily_digest", "a")).toBe(true);
    });
  });
});

describe("isUniqueViolation", () => {
  it("recognizes sqlite unique and primary key codes", () => {
    expect(isUniqueViolation({ code: "SQLITE_CONSTRAINT_UNIQUE" })).toBe(true);
    expect(isUniqueViolation({ code: "SQLITE_CONSTRAINT_PRIMARYKEY" })).toBe(true);
  });

  it("rejects other errors", () => {
    expect(isUniqueViolation({ code: "SQLITE_BUSY" })).toBe(false);
    expect(isUniqueViolation(new Error("boom"))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
