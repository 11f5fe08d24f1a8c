import type { Logger } from "../logging/logger.js";
import type { CommitSummary } from "../integrations/types.js";
import { confirmWrite } from "../integrations/response.js";
import { parseIssueContext } from "../context/issue.js";
import { ExecutionError, errorMessage } from "./errors.js";
import { openSession, requireRepo } from "./types.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

export const DONE_SCAN_MARKER = "<!-- leadsync:done-scan -->";

/** Commits whose message mentions the key as a whole word, so LEADS-4 does not match LEADS-40. */
export function commitsForTicket(commits: readonly CommitSummary[], ticketKey: string): CommitSummary[] {
  const escaped = ticketKey.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`\\b${escaped}\\b`, "i");
  return commits.filter((commit) => pattern.test(commit.message));
}

export function doneScanPrompt(params: { ticketKey: string; summary: string; commits: readonly CommitSummary[] }): string {
  const commitLines = params.commits.map((commit) => {
    const files = commit.files.map((file) => `${file.filename} (${file.status})`).join(", ");
    return `- ${commit.sha.slice(0, 7)} ${commit.author}: ${commit.message.split("\n")[0] ?? ""}${files ? ` [${files}]` : ""}`;
  });
  return [
    `Ticket ${params.ticketKey} was marked done: ${params.summary || "No summary"}.`,
    "Summarize how it was implemented, using only these commits:",
    ...commitLines,
    "Answer with exactly these lines:",
    "IMPLEMENTATION_SUMMARY: <2-3 sentences>",
    "FILES_CHANGED: <comma-separated paths>",
  ].join("\n");
}

/** When a ticket reaches Done, comments once with how the code implemented it. */
export class DoneScanWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "done_scan" });
  }

  async run(payload: unknown): Promise<WorkflowResult> {
    const issue = parseIssueContext(payload);
    const repo = requireRepo(this.deps);
    const { tracker } = this.deps;

    try {
      const comments = await tracker.listComments(issue.issueKey);
      if (comments.some((comment) => comment.body.includes(DONE_SCAN_MARKER))) {
        return { status: "skipped", model: null, result: { ticket_key: issue.issueKey, reason: "already scanned" } };
      }
    } catch (err) {
      this.logger.warn({ err, ticketKey: issue.issueKey }, "Comment lookup failed; scanning anyway");
    }

    let commits: CommitSummary[];
    try {
      commits = await this.deps.codeHost.listCommits(repo, { branch: this.deps.config.github.branch, limit: 100 });
    } catch (err) {
      throw new ExecutionError(`Failed to list commits: ${errorMessage(err)}`, { cause: err });
    }
    const matching = commitsForTicket(commits, issue.issueKey);

    let model: string | null = null;
    let summary: string;
    if (matching.length === 0) {
      summary = `IMPLEMENTATION_SUMMARY: No commits referencing ${issue.issueKey} were found on ${this.deps.config.github.branch}.`;
    } else {
      const session = openSession(this.deps, this.logger);
      const generated = await session.generate(
        doneScanPrompt({ ticketKey: issue.issueKey, summary: issue.summary, commits: matching }),
      );
      model = generated.model;
      summary = generated.text;
    }

    confirmWrite(
      "Jira done-scan comment",
      await tracker.addComment(issue.issueKey, `${DONE_SCAN_MARKER}\nImplementation scan for ${issue.issueKey}:\n${summary}`),
    );
    this.deps.recorder.recordEvent({
      eventType: "done_scan_run",
      workflow: "done_scan",
      ticketKey: issue.issueKey,
      projectKey: issue.projectKey || null,
      label: issue.primaryLabel || null,
      component: issue.primaryComponent || null,
      payload: { summary, commit_count: matching.length, shas: matching.map((commit) => commit.sha), model },
    });
    return {
      status: "processed",
      model,
      result: { ticket_key: issue.issueKey, commit_count: matching.length, summary },
    };
  }
}
