import type { Logger } from "../logging/logger.js";
import { confirmWrite } from "../integrations/response.js";
import { parsePrContext } from "../pr/context.js";
import type { PrContext } from "../pr/context.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

const LINK_ACTIONS = new Set(["opened", "reopened"]);

export const NO_TICKET_WARNING = "No Jira ticket detected. Please add a ticket key such as LEADS-123 to the PR title.";

export function buildPrLinkComment(pr: PrContext): string {
  const lines = [`Pull Request #${pr.number} Linked`];
  if (pr.title) lines.push(`Title: ${pr.title}`);
  lines.push(`URL: ${pr.url}`);
  if (pr.branch) lines.push(`Branch: ${pr.branch}`);
  lines.push(`Repository: ${pr.owner}/${pr.repo}`);
  if (pr.headSha) lines.push(`Commit: ${pr.headSha.slice(0, 7)}`);
  lines.push("", "Automatically linked by LeadSync");
  return lines.join("\n");
}

/** Links newly opened PRs to their Jira ticket and moves the ticket to review. */
export class PrLinkWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "pr_link" });
  }

  private async postLinkComment(pr: PrContext): Promise<"posted" | "duplicate"> {
    try {
      const comments = await this.deps.tracker.listComments(pr.ticketKey);
      if (pr.url && comments.some((comment) => comment.body.includes(pr.url))) return "duplicate";
    } catch (err) {
      this.logger.warn({ err, ticketKey: pr.ticketKey }, "Comment lookup failed; posting link anyway");
    }
    confirmWrite("Jira PR link comment", await this.deps.tracker.addComment(pr.ticketKey, buildPrLinkComment(pr)));
    return "posted";
  }

  private async moveToReview(ticketKey: string): Promise<string> {
    const transitions = await this.deps.tracker.listTransitions(ticketKey);
    const target = transitions.find((transition) => transition.name.toLowerCase().includes("in review"));
    if (!target) {
      this.logger.warn({ ticketKey }, "No 'In Review' transition available");
      return "skipped:no-in-review-transition";
    }
    confirmWrite("Jira transition", await this.deps.tracker.transitionIssue(ticketKey, target.id));
    return `transitioned:${target.name}`;
  }

  async run(payload: unknown): Promise<WorkflowResult> {
    const pr = parsePrContext(payload);
    if (!LINK_ACTIONS.has(pr.action)) {
      return { status: "skipped", model: null, result: { reason: `action '${pr.action}'` } };
    }
    if (!pr.number || !pr.owner || !pr.repo) {
      return { status: "skipped", model: null, result: { reason: "missing PR metadata" } };
    }

    if (!pr.ticketKey) {
      confirmWrite(
        "GitHub warning comment",
        await this.deps.codeHost.addIssueComment({ owner: pr.owner, repo: pr.repo }, pr.number, NO_TICKET_WARNING),
      );
      this.logger.info({ pr: pr.number }, "PR has no ticket key; warned on the PR");
      return { status: "processed", model: null, result: { pr_number: pr.number, warning: "posted" } };
    }

    const comment = await this.postLinkComment(pr);
    const transition = await this.moveToReview(pr.ticketKey);
    this.deps.recorder.recordEvent({
      eventType: "pr_linked",
      workflow: "pr_link",
      ticketKey: pr.ticketKey,
      payload: { pr_number: pr.number, url: pr.url, repo: `${pr.owner}/${pr.repo}`, comment, transition },
    });
    this.logger.info({ ticketKey: pr.ticketKey, pr: pr.number, comment, transition }, "PR linked");
    return {
      status: "processed",
      model: null,
      result: { pr_number: pr.number, ticket_key: pr.ticketKey, comment, transition },
    };
  }
}
