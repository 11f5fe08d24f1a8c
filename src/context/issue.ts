import { asArray, asRecord, asString, extractText, isRecord } from "../utils/text.js";
import type { JsonRecord } from "../utils/text.js";

export interface IssueContext {
  readonly issueKey: string;
  readonly summary: string;
  readonly description: string;
  readonly labels: string[];
  readonly componentNames: string[];
  readonly assignee: string;
  readonly projectKey: string;
  /** Jira status category key: "new", "indeterminate" or "done". Empty when absent. */
  readonly statusCategory: string;
  readonly primaryLabel: string;
  readonly primaryComponent: string;
}

export function firstNonEmpty(values: readonly string[]): string {
  for (const value of values) {
    if (value.trim()) return value.trim();
  }
  return "";
}

function pick(fields: JsonRecord, issue: JsonRecord, key: string): unknown {
  return key in fields ? fields[key] : issue[key];
}

/**
 * Normalizes a Jira webhook body or a REST issue. Accepts `{issue}`,
 * `{workItem}` or a bare issue object.
 */
export function parseIssueContext(payload: unknown): IssueContext {
  const root = asRecord(payload);
  let issue = isRecord(root["issue"]) ? root["issue"] : asRecord(root["workItem"]);
  if (Object.keys(issue).length === 0 && ("key" in root || "id" in root)) issue = root;

  const fields = asRecord(issue["fields"]);
  const labels = asArray(pick(fields, issue, "labels")).filter(
    (label): label is string => typeof label === "string",
  );
  const componentNames = asArray(pick(fields, issue, "components")).map((component) =>
    asString(asRecord(component)["name"]),
  );
  const assignee = asRecord(pick(fields, issue, "assignee"));
  const status = asRecord(pick(fields, issue, "status"));

  return {
    issueKey: asString(issue["key"]) || asString(issue["id"]) || "UNKNOWN",
    summary: asString(pick(fields, issue, "summary")),
    description: extractText(pick(fields, issue, "description")),
    labels,
    componentNames,
    assignee:
      asString(assignee["displayName"]) ||
      asString(assignee["display_name"]) ||
      asString(assignee["name"]) ||
      "Unassigned",
    projectKey: asString(asRecord(pick(fields, issue, "project"))["key"]),
    statusCategory: asString(asRecord(status["statusCategory"])["key"]).toLowerCase(),
    primaryLabel: firstNonEmpty(labels),
    primaryComponent: firstNonEmpty(componentNames),
  };
}
