export type EventType =
  | "ticket_enrichment_run"
  | "github_commit_batch"
  | "daily_digest_posted"
  | "slack_question_answered"
  | "done_scan_run"
  | "pr_description_updated"
  | "pr_linked";

export type MemoryItemType =
  | "ticket_enrichment"
  | "daily_digest_area"
  | "slack_qa"
  | "leader_rule";

export const WORKFLOW_NAMES = [
  "ticket_enrichment",
  "daily_digest",
  "slack_qa",
  "pr_description",
  "pr_link",
  "done_scan",
  "leader_rules",
] as const;

export type WorkflowName = (typeof WORKFLOW_NAMES)[number];

export function isWorkflowName(value: string): value is WorkflowName {
  return WORKFLOW_NAMES.some((name) => name === value);
}

export type JsonObject = Record<string, unknown>;

export interface MemoryEvent {
  readonly id: number;
  readonly eventType: EventType;
  readonly workflow: WorkflowName;
  readonly ticketKey: string | null;
  readonly projectKey: string | null;
  readonly label: string | null;
  readonly component: string | null;
  readonly payload: JsonObject;
  /** UTC ISO-8601. */
  readonly createdAt: string;
}

export interface MemoryItem {
  readonly id: number;
  readonly workflow: WorkflowName;
  readonly itemType: MemoryItemType;
  readonly ticketKey: string | null;
  readonly projectKey: string | null;
  readonly label: string | null;
  readonly component: string | null;
  readonly repoKey: string | null;
  readonly teamKey: string | null;
  readonly summary: string;
  readonly decision: string | null;
  readonly rulesApplied: string | null;
  readonly context: JsonObject | null;
  readonly createdAt: string;
}
