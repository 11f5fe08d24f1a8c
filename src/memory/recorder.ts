import type { MemoryDB } from "./db.js";
import type { Logger } from "../logging/logger.js";
import type { EventType, JsonObject, MemoryItemType, WorkflowName } from "./types.js";

export interface RecordEventParams {
  readonly eventType: EventType;
  readonly workflow: WorkflowName;
  readonly ticketKey?: string | null;
  readonly projectKey?: string | null;
  readonly label?: string | null;
  readonly component?: string | null;
  readonly payload: JsonObject;
}

export interface RecordMemoryItemParams {
  readonly itemType: MemoryItemType;
  readonly workflow: WorkflowName;
  readonly ticketKey?: string | null;
  readonly projectKey?: string | null;
  readonly label?: string | null;
  readonly component?: string | null;
  readonly repoKey?: string | null;
  readonly teamKey?: string | null;
  readonly summary: string;
  readonly decision?: string | null;
  readonly rulesApplied?: string | null;
  readonly context?: JsonObject | null;
}

export interface RecorderOptions {
  readonly now?: () => Date;
}

/**
 * Append-only writer for the memory store. None of its methods throw: a
 * failing store is logged and the workflow carries on.
 */
export class MemoryRecorder {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: MemoryDB,
    logger: Logger,
    opts?: RecorderOptions,
  ) {
    this.logger = logger.child({ component: "memory-recorder" });
    this.now = opts?.now ?? (() => new Date());
  }

  recordEvent(params: RecordEventParams): void {
    try {
      this.store
        .initialize()
        .prepare(
          `INSERT INTO events (event_type, workflow, ticket_key, project_key, label, component, payload_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          params.eventType,
          params.workflow,
          params.ticketKey ?? null,
          params.projectKey ?? null,
          params.label ?? null,
          params.component ?? null,
          JSON.stringify(params.payload),
          this.timestamp(),
        );
    } catch (err) {
      this.logger.error(
        { err, eventType: params.eventType, workflow: params.workflow, ticketKey: params.ticketKey },
        "Failed to record event",
      );
    }
  }

  recordMemoryItem(params: RecordMemoryItemParams): void {
    try {
      this.store
        .initialize()
        .prepare(
          `INSERT INTO memory_items (workflow, item_type, ticket_key, project_key, label, component,
             repo_key, team_key, summary, decision, rules_applied, context_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          params.workflow,
          params.itemType,
          params.ticketKey ?? null,
          params.projectKey ?? null,
          params.label ?? null,
          params.component ?? null,
          params.repoKey ?? null,
          params.teamKey ?? null,
          params.summary,
          params.decision ?? null,
          params.rulesApplied ?? null,
          params.context ? JSON.stringify(params.context) : null,
          this.timestamp(),
        );
    } catch (err) {
      this.logger.error(
        { err, itemType: params.itemType, workflow: params.workflow, ticketKey: params.ticketKey },
        "Failed to record memory item",
      );
    }
  }

  /**
   * Inserts the (workflow, lockKey) marker. Returns false only when the
   * UNIQUE constraint rejects it, meaning this bucket already ran. Any other
   * store failure returns true so the run is not blocked.
   */
  acquireIdempotencyLock(workflow: WorkflowName, lockKey: string): boolean {
    try {
      this.store
        .initialize()
        .prepare("INSERT INTO idempotency_locks (workflow, lock_key, created_at) VALUES (?, ?, ?)")
        .run(workflow, lockKey, this.timestamp());
      return true;
    } catch (err) {
      if (isUniqueViolation(err)) {
        this.logger.info({ workflow, lockKey }, "Idempotency lock already held");
        return false;
      }
      this.logger.error({ err, workflow, lockKey }, "Idempotency lock failed; proceeding without it");
      return true;
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
