import type { Logger } from "../logging/logger.js";
import type { TrackerClient } from "../integrations/types.js";
import { asRecord, asString, excerpt, extractText } from "../utils/text.js";
import type { JsonRecord } from "../utils/text.js";
import { errorMessage } from "../workflows/errors.js";

export const DEFAULT_HISTORY_LIMIT = 10;
const HISTORY_FIELDS = ["summary", "description", "status", "resolutiondate", "labels"] as const;

export interface HistoryTicket {
  readonly key: string;
  readonly summary: string;
  readonly descriptionExcerpt: string;
  readonly status: string;
  readonly resolutionDate: string;
}

export function escapeJql(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export function buildSameLabelDoneJql(projectKey: string, label: string, excludeKey: string): string {
  return (
    `project = "${escapeJql(projectKey)}" ` +
    `AND labels = "${escapeJql(label)}" ` +
    "AND statusCategory = Done " +
    `AND key != "${escapeJql(excludeKey)}" ` +
    "ORDER BY resolutiondate DESC"
  );
}

export function parseHistoryTickets(issues: readonly JsonRecord[], limit: number): HistoryTicket[] {
  const rows: HistoryTicket[] = [];
  for (const issue of issues.slice(0, limit)) {
    const key = asString(issue["key"]);
    if (!key) continue;
    const fields = asRecord(issue["fields"]);
    const description = extractText(fields["description"]);
    rows.push({
      key,
      summary: asString(fields["summary"]).trim(),
      descriptionExcerpt: description ? excerpt(description, 220) : "No implementation notes provided.",
      status: (asString(asRecord(fields["status"])["name"]) || "Done").trim(),
      resolutionDate: asString(fields["resolutiondate"]).trim(),
    });
  }
  return rows;
}

/** Prompt-ready summary of completed tickets sharing `label`. Lookup failures degrade to a one-line notice. */
export async function buildSameLabelHistory(
  tracker: TrackerClient,
  params: { projectKey: string; label: string; excludeKey: string; limit?: number },
  logger: Logger,
): Promise<string> {
  if (!params.projectKey || !params.label) return "No comparable label history available.";
  const limit = params.limit ?? DEFAULT_HISTORY_LIMIT;

  let issues: JsonRecord[];
  try {
    issues = await tracker.searchIssues(
      buildSameLabelDoneJql(params.projectKey, params.label, params.excludeKey),
      HISTORY_FIELDS,
      limit,
    );
  } catch (err) {
    logger.warn({ err, ticketKey: params.excludeKey }, "Same-label history lookup failed");
    return `History retrieval unavailable: ${errorMessage(err)}`;
  }

  const tickets = parseHistoryTickets(issues, limit);
  if (tickets.length === 0) return "No completed same-label tickets found.";
  return [
    `Same-label completed tickets (latest ${tickets.length}):`,
    ...tickets.map(
      (ticket) =>
        `- ${ticket.key} [${ticket.status}] (${ticket.resolutionDate || "unknown-resolution-date"}): ` +
        `${ticket.summary || "No summary"} | Completed details: ${ticket.descriptionExcerpt}`,
    ),
  ].join("\n");
}
