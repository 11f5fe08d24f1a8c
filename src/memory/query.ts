import type { MemoryDB } from "./db.js";
import type { Logger } from "../logging/logger.js";
import { isRecord } from "../utils/text.js";
import type {
  EventType,
  JsonObject,
  MemoryEvent,
  MemoryItem,
  MemoryItemType,
  WorkflowName,
} from "./types.js";

export interface SimilarQaParams {
  label?: string | null;
  component?: string | null;
  limit?: number;
  excludeTicketKey?: string | null;
}

export interface DigestAreaParams {
  limit?: number;
  sinceDays?: number;
  projectKey?: string | null;
  repoKey?: string | null;
  teamKey?: string | null;
}

export interface RecentEventsParams {
  workflow?: WorkflowName;
  ticketKey?: string;
  eventType?: EventType;
  limit?: number;
}

export interface SlackMemoryContext {
  readonly ticketMemory: MemoryItem[];
  readonly digestAreas: MemoryItem[];
  readonly similarQa: MemoryItem[];
}

const ORDER = "ORDER BY created_at DESC, id DESC";

/**
 * Read side of the memory store. Every query answers with an empty list when
 * nothing matches or the store cannot be opened.
 */
export class MemoryQuery {
  private readonly logger: Logger;

  constructor(
    private readonly store: MemoryDB,
    logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.logger = logger.child({ component: "memory-query" });
  }

  leaderRules(category?: string | null, limit = 20): MemoryItem[] {
    const where = ["item_type = ?"];
    const args: unknown[] = ["leader_rule"];
    if (category) {
      where.push("label = ?");
      args.push(category);
    }
    return this.items("leaderRules", where, args, limit);
  }

  similarQa(params: SimilarQaParams): MemoryItem[] {
    const where = ["item_type = ?"];
    const args: unknown[] = ["slack_qa"];
    if (params.label) {
      where.push("label = ?");
      args.push(params.label);
    }
    if (params.component) {
      where.push("component = ?");
      args.push(params.component);
    }
    if (params.excludeTicketKey) {
      where.push("(ticket_key IS NULL OR ticket_key != ?)");
      args.push(params.excludeTicketKey);
    }
    return this.items("similarQa", where, args, params.limit ?? 3);
  }

  recentDigestAreas(params: DigestAreaParams = {}): MemoryItem[] {
    const where = ["item_type = ?"];
    const args: unknown[] = ["daily_digest_area"];
    if (params.sinceDays !== undefined) {
      const since = new Date(this.now().getTime() - params.sinceDays * 86_400_000);
      where.push("created_at >= ?");
      args.push(since.toISOString());
    }
    if (params.projectKey) {
      where.push("project_key = ?");
      args.push(params.projectKey);
    }
    if (params.repoKey) {
      where.push("repo_key = ?");
      args.push(params.repoKey);
    }
    if (params.teamKey) {
      where.push("team_key = ?");
      args.push(params.teamKey);
    }
    return this.items("recentDigestAreas", where, args, params.limit ?? 5);
  }

  ticketMemory(ticketKey: string, limit = 10): MemoryItem[] {
    return this.items("ticketMemory", ["ticket_key = ?"], [ticketKey], limit);
  }

  /** Single entry point for the Q&A workflow: this ticket, recent digests, similar answers. */
  slackMemoryContext(params: {
    ticketKey: string;
    label?: string | null;
    component?: string | null;
    projectKey?: string | null;
  }): SlackMemoryContext {
    const hasSimilarity = Boolean(params.label || params.component);
    return {
      ticketMemory: this.ticketMemory(params.ticketKey, 5),
      digestAreas: this.recentDigestAreas({ limit: 3, sinceDays: 7, projectKey: params.projectKey }),
      similarQa: hasSimilarity
        ? this.similarQa({
            label: params.label,
            component: params.component,
            limit: 3,
            excludeTicketKey: params.ticketKey,
          })
        : [],
    };
  }

  recentEvents(params: RecentEventsParams = {}): MemoryEvent[] {
    const where: string[] = [];
    const args: unknown[] = [];
    if (params.workflow) {
      where.push("workflow = ?");
      args.push(params.workflow);
    }
    if (params.ticketKey) {
      where.push("ticket_key = ?");
      args.push(params.ticketKey);
    }
    if (params.eventType) {
      where.push("event_type = ?");
      args.push(params.eventType);
    }
    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    try {
      const rows = this.store
        .initialize()
        .prepare(`SELECT * FROM events ${clause} ${ORDER} LIMIT ?`)
        .all(...args, params.limit ?? 20) as Record<string, unknown>[];
      return rows.map(toEvent);
    } catch (err) {
      this.logger.warn({ err, query: "recentEvents" }, "Memory query failed");
      return [];
    }
  }

  private items(query: string, where: string[], args: unknown[], limit: number): MemoryItem[] {
    try {
      const rows = this.store
        .initialize()
        .prepare(`SELECT * FROM memory_items WHERE ${where.join(" AND ")} ${ORDER} LIMIT ?`)
        .all(...args, Math.max(0, limit)) as Record<string, unknown>[];
      return rows.map(toItem);
    } catch (err) {
      this.logger.warn({ err, query }, "Memory query failed");
      return [];
    }
  }
}

/** A corrupt blob yields null so one bad row does not hide the rest of the result. */
function parseJson(raw: unknown): JsonObject | null {
  if (typeof raw !== "string" || raw === "") return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function toEvent(row: Record<string, unknown>): MemoryEvent {
  return {
    id: row["id"] as number,
    eventType: row["event_type"] as EventType,
    workflow: row["workflow"] as WorkflowName,
    ticketKey: (row["ticket_key"] as string | null) ?? null,
    projectKey: (row["project_key"] as string | null) ?? null,
    label: (row["label"] as string | null) ?? null,
    component: (row["component"] as string | null) ?? null,
    payload: parseJson(row["payload_json"]) ?? {},
    createdAt: row["created_at"] as string,
  };
}

function toItem(row: Record<string, unknown>): MemoryItem {
  return {
    id: row["id"] as number,
    workflow: row["workflow"] as WorkflowName,
    itemType: row["item_type"] as MemoryItemType,
    ticketKey: (row["ticket_key"] as string | null) ?? null,
    projectKey: (row["project_key"] as string | null) ?? null,
    label: (row["label"] as string | null) ?? null,
    component: (row["component"] as string | null) ?? null,
    repoKey: (row["repo_key"] as string | null) ?? null,
    teamKey: (row["team_key"] as string | null) ?? null,
    summary: row["summary"] as string,
    decision: (row["decision"] as string | null) ?? null,
    rulesApplied: (row["rules_applied"] as string | null) ?? null,
    context: parseJson(row["context_json"]),
    createdAt: row["created_at"] as string,
  };
}

function renderItems(items: readonly MemoryItem[], render: (item: MemoryItem) => string): string[] {
  return items.length > 0 ? items.map((item) => `- ${render(item)}`) : ["- None."];
}

export function formatSlackMemoryContext(ctx: SlackMemoryContext): string {
  return [
    "Memory Context",
    "Ticket Memory:",
    ...renderItems(ctx.ticketMemory, (item) =>
      item.decision ? `${item.summary} (decision: ${item.decision})` : item.summary,
    ),
    "Recent Digest Signals:",
    ...renderItems(ctx.digestAreas, (item) => `${item.component ?? "general"}: ${item.summary}`),
    "Similar Q&A:",
    ...renderItems(ctx.similarQa, (item) =>
      item.decision ? `${item.summary} -> ${item.decision}` : item.summary,
    ),
  ].join("\n");
}
