import { readFileSync } from "node:fs";
import { basename } from "node:path";
import type { Logger } from "../logging/logger.js";
import type { CommitSummary } from "../integrations/types.js";
import { confirmWrite } from "../integrations/response.js";
import { parseIssueContext } from "../context/issue.js";
import type { IssueContext } from "../context/issue.js";
import {
  appendLeaderRules,
  loadPreferences,
  loadRuleset,
  resolvePreferenceCategory,
  rulesetFileName,
} from "../context/preferences.js";
import { buildSameLabelHistory } from "../context/jira-history.js";
import { formatKeyFilesMarkdown, parseKeyFiles, rankCandidateFiles } from "../context/key-files.js";
import {
  buildCommentText,
  buildDescriptionText,
  normalizePromptMarkdown,
  writePromptFile,
} from "../context/prompt-artifact.js";
import { openSession, requireRepo, currentTime } from "./types.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

const RECENT_COMMIT_HOURS = 24;

function commonContext(issue: IssueContext): string {
  return [
    `Issue key: ${issue.issueKey}`,
    `Summary: ${issue.summary}`,
    `Description: ${issue.description || "No description provided."}`,
    `Labels: ${issue.labels.join(", ") || "none"}`,
    `Primary label: ${issue.primaryLabel || "N/A"}`,
    `Assignee: ${issue.assignee}`,
    `Project: ${issue.projectKey}`,
    `Components: ${issue.componentNames.join(", ") || "none"}`,
  ].join("\n");
}

function formatCommits(commits: readonly CommitSummary[]): string {
  if (commits.length === 0) return "No commits in the last 24 hours.";
  return commits
    .slice(0, 15)
    .map((commit) => {
      const files = commit.files.map((file) => file.filename).slice(0, 6).join(", ");
      const subject = commit.message.split("\n")[0] ?? "";
      return `- ${commit.sha.slice(0, 7)} ${commit.author}: ${subject}${files ? ` [${files}]` : ""}`;
    })
    .join("\n");
}

export function gatherPrompt(params: {
  context: string;
  history: string;
  commits: string;
  repo: string;
}): string {
  return [
    "Gather context for this issue.",
    params.context,
    `GitHub repository target: ${params.repo}`,
    "Recent main-branch commits (supporting signal only):",
    params.commits,
    "Same-label history context:",
    params.history,
    "Required output:",
    "1) Relevant linked/recent Jira issue summary",
    "2) Recent commits related to this issue scope (if any)",
    "3) Risks/constraints discovered",
    "4) Summary of previous progress from the completed same-label tickets",
    "5) 3-8 source files or modules likely impacted as strict lines in this exact format:",
    "   KEY_FILE: <path> | WHY: <one-line rationale> | CONFIDENCE: <high|medium|low>",
  ].join("\n");
}

export function reasonPrompt(params: {
  gathered: string;
  context: string;
  rulesetFile: string;
  ruleset: string;
  category: string;
  preferences: string;
}): string {
  return [
    "From the gathered context below, write one markdown document with these exact sections in order:",
    "## Task, ## Context, ## Key Files, ## Constraints, ## Implementation Rules, ## Expected Output.",
    "In Context, summarize previous same-label completed work.",
    "In Key Files, list exactly the key files from the gathered context with path, why and confidence.",
    `Apply rules from ruleset '${params.rulesetFile}':`,
    params.ruleset || "(no ruleset content)",
    `Apply team preference guidance for category '${params.category}':`,
    params.preferences,
    "Finish Expected Output with a code/tests/docs checklist. Keep the tone technical and execution-oriented.",
    "Gathered context:",
    params.gathered,
    params.context,
  ].join("\n");
}

/**
 * Ticket enrichment: turns a Jira issue into an implementation prompt, attaches
 * it, rewrites the description and comments with the implementation path.
 */
export class TicketEnrichmentWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "ticket_enrichment" });
  }

  async run(payload: unknown): Promise<WorkflowResult> {
    const { config, tracker, codeHost, recorder, query } = this.deps;
    const issue = parseIssueContext(payload);
    const repo = requireRepo(this.deps);
    const repoLabel = `${repo.owner}/${repo.repo}`;

    const category = resolvePreferenceCategory(issue.labels, issue.componentNames);
    const rulesetFile = rulesetFileName(category);
    const ruleset = loadRuleset(this.deps.templatesDir, category);
    const preferences = appendLeaderRules(
      await loadPreferences(this.deps.docs, config.docs.preferenceDocs, category),
      [...query.leaderRules(category), ...query.leaderRules("general")],
    );

    const history = await buildSameLabelHistory(
      tracker,
      { projectKey: issue.projectKey, label: issue.primaryLabel, excludeKey: issue.issueKey },
      this.logger,
    );

    let commits: CommitSummary[] = [];
    try {
      const since = new Date(currentTime(this.deps).getTime() - RECENT_COMMIT_HOURS * 3_600_000);
      commits = await codeHost.listCommits(repo, {
        branch: config.github.branch,
        since: since.toISOString(),
        limit: 20,
      });
    } catch (err) {
      this.logger.warn({ err, ticketKey: issue.issueKey }, "Recent commit lookup failed");
    }

    const context = commonContext(issue);
    const session = openSession(this.deps, this.logger);
    const gathered = await session.generate(
      gatherPrompt({ context, history, commits: formatCommits(commits), repo: repoLabel }),
    );

    let keyFiles = parseKeyFiles(gathered.text);
    if (keyFiles.length === 0) {
      keyFiles = rankCandidateFiles(commits, `${issue.summary} ${issue.description} ${issue.labels.join(" ")}`);
    }
    const keyFilesMarkdown = formatKeyFilesMarkdown(keyFiles);

    const reasoned = await session.generate(
      reasonPrompt({ gathered: gathered.text, context, rulesetFile, ruleset, category, preferences }),
    );
    const markdown = normalizePromptMarkdown(reasoned.text, {
      issueKey: issue.issueKey,
      summary: issue.summary,
      gatheredContext: gathered.text,
      keyFilesMarkdown,
      ruleset,
    });

    const promptPath = writePromptFile(config.artifacts.dir, issue.issueKey, markdown);
    confirmWrite(
      "Jira attachment",
      await tracker.addAttachment(issue.issueKey, {
        filename: basename(promptPath),
        content: readFileSync(promptPath, "utf-8"),
      }),
    );

    const writeback = {
      issueKey: issue.issueKey,
      summary: issue.summary,
      repoOwner: repo.owner,
      repoName: repo.repo,
      keyFilesMarkdown,
    };
    confirmWrite(
      "Jira description update",
      await tracker.editIssue(issue.issueKey, {
        description: buildDescriptionText({ ...writeback, promptMarkdown: markdown }),
      }),
    );
    confirmWrite(
      "Jira comment",
      await tracker.addComment(issue.issueKey, buildCommentText({ ...writeback, sameLabelHistory: history })),
    );

    const model = session.model;
    const label = issue.primaryLabel || null;
    const component = issue.primaryComponent || null;
    recorder.recordEvent({
      eventType: "ticket_enrichment_run",
      workflow: "ticket_enrichment",
      ticketKey: issue.issueKey,
      projectKey: issue.projectKey || null,
      label,
      component,
      payload: {
        preference_category: category,
        model,
        prompt_file: promptPath,
        repo: repoLabel,
        key_file_count: keyFiles.length,
      },
    });
    recorder.recordMemoryItem({
      itemType: "ticket_enrichment",
      workflow: "ticket_enrichment",
      ticketKey: issue.issueKey,
      projectKey: issue.projectKey || null,
      label,
      component,
      repoKey: repoLabel,
      summary: issue.summary.trim() || `Technical guidance prepared for ${issue.issueKey}`,
      decision: reasoned.text,
      rulesApplied: category,
      context: { same_label_history: history, key_files_markdown: keyFilesMarkdown },
    });

    this.logger.info({ ticketKey: issue.issueKey, model, category }, "Ticket enriched");
    return {
      status: "processed",
      model,
      result: {
        ticket_key: issue.issueKey,
        prompt_file: promptPath,
        preference_category: category,
        key_files: keyFiles.map((file) => file.path),
      },
    };
  }
}
