import type { Logger } from "../logging/logger.js";
import type { MemoryItem } from "../memory/types.js";
import { isPreferenceCategory } from "../context/preferences.js";
import { ConfigurationError } from "./errors.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

export interface ParsedRule {
  readonly category: string;
  readonly text: string;
}

/** `database: never drop columns` → database; text without a known category prefix is "general". */
export function parseLeaderRule(input: string): ParsedRule {
  const trimmed = input.trim();
  const colon = trimmed.indexOf(":");
  if (colon > 0) {
    const prefix = trimmed.slice(0, colon).trim().toLowerCase();
    if (isPreferenceCategory(prefix) || prefix === "general") {
      return { category: prefix, text: trimmed.slice(colon + 1).trim() };
    }
  }
  return { category: "general", text: trimmed };
}

/** Tech-lead rules stored as memory items and appended to preference text. */
export class LeaderRulesWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: Pick<WorkflowDeps, "logger" | "recorder" | "query">) {
    this.logger = deps.logger.child({ workflow: "leader_rules" });
  }

  add(input: string, author?: string | null): WorkflowResult {
    const rule = parseLeaderRule(input);
    if (!rule.text) throw new ConfigurationError("Rule text is empty");
    this.deps.recorder.recordMemoryItem({
      itemType: "leader_rule",
      workflow: "leader_rules",
      label: rule.category,
      summary: rule.text,
      rulesApplied: rule.category,
      context: author ? { author } : null,
    });
    this.logger.info({ category: rule.category }, "Leader rule stored");
    return { status: "processed", model: null, result: { category: rule.category, rule: rule.text } };
  }

  list(category?: string | null, limit = 50): MemoryItem[] {
    return this.deps.query.leaderRules(category, limit);
  }
}
