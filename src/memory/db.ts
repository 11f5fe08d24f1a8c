import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS events (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type   TEXT NOT NULL,
  workflow     TEXT NOT NULL,
  ticket_key   TEXT,
  project_key  TEXT,
  label        TEXT,
  component    TEXT,
  payload_json TEXT NOT NULL,
  created_at   TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_ticket_created ON events(ticket_key, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_events_workflow_created ON events(workflow, created_at DESC);

CREATE TABLE IF NOT EXISTS memory_items (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  workflow      TEXT NOT NULL,
  item_type     TEXT NOT NULL CHECK(item_type IN ('ticket_enrichment','daily_digest_area','slack_qa','leader_rule')),
  ticket_key    TEXT,
  project_key   TEXT,
  label         TEXT,
  component     TEXT,
  repo_key      TEXT,
  team_key      TEXT,
  summary       TEXT NOT NULL,
  decision      TEXT,
  rules_applied TEXT,
  context_json  TEXT,
  created_at    TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_memory_ticket ON memory_items(ticket_key, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_memory_digest ON memory_items(item_type, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_memory_similarity ON memory_items(label, component, item_type, created_at DESC);

CREATE TABLE IF NOT EXISTS idempotency_locks (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  workflow   TEXT NOT NULL,
  lock_key   TEXT NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE(workflow, lock_key)
);
`;

/**
 * Owns the SQLite file holding events, memory items and idempotency locks.
 * The connection is opened on the first `initialize()` so that a missing or
 * unwritable location surfaces at the caller's catch boundary, not at
 * construction.
 */
export class MemoryDB {
  private db: Database.Database | null = null;

  constructor(private readonly path: string) {}

  get location(): string {
    return this.path;
  }

  /** Opens the file (creating its directory) and applies the schema. Repeat calls reuse the open handle. */
  initialize(): Database.Database {
    if (this.db?.open) return this.db;

    if (this.path !== ":memory:") {
      mkdirSync(dirname(this.path), { recursive: true });
    }
    const db = new Database(this.path);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.exec(SCHEMA_SQL);
    this.db = db;
    return db;
  }

  isOpen(): boolean {
    return this.db?.open ?? false;
  }

  close(): void {
    if (this.db?.open) {
      this.db.close();
    }
    this.db = null;
  }
}
