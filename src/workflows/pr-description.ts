import type { Logger } from "../logging/logger.js";
import type { CommitFile, RepoRef } from "../integrations/types.js";
import { confirmWrite } from "../integrations/response.js";
import { parsePrContext } from "../pr/context.js";
import type { PrContext } from "../pr/context.js";
import { mergeFilesByPath, parseUnifiedDiff } from "../pr/diff.js";
import {
  changeFingerprint,
  parseSections,
  readFingerprint,
  renderDetailsBlock,
  ruleBasedSections,
  upsertDetailsBlock,
} from "../pr/details.js";
import type { PrSections } from "../pr/details.js";
import { openSession } from "./types.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

export const PR_ACTIONS = new Set(["opened", "reopened", "synchronize", "edited", "ready_for_review"]);

const MAX_DIFF_CHARS = 16_000;

export function buildDiffContext(files: readonly CommitFile[], maxChars = MAX_DIFF_CHARS): string {
  const chunks: string[] = [];
  let consumed = 0;
  for (const file of files) {
    const chunk =
      `FILE: ${file.filename} (${file.status}, +${file.additions}/-${file.deletions})\n` +
      `${file.patch.trim() || "(patch unavailable)"}\n`;
    if (consumed + chunk.length > maxChars) break;
    chunks.push(chunk);
    consumed += chunk.length;
  }
  return chunks.join("\n").trim();
}

export function sectionsPrompt(params: { ticketKey: string; title: string; diff: string }): string {
  return [
    "Generate PR sections using ONLY the diff context below.",
    "Do not invent architecture not present in the diffs.",
    "Return STRICT JSON with keys:",
    "summary: string",
    "implementation_details: string[]",
    "suggested_validation: string[]",
    "",
    `Ticket key: ${params.ticketKey || "N/A"}`,
    `PR title: ${params.title || "N/A"}`,
    "",
    "Diff context:",
    params.diff,
  ].join("\n");
}

/** Keeps an auto-generated details block in the PR body in sync with the code changes. */
export class PrDescriptionWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "pr_description" });
  }

  /**
   * Changed files by the first strategy that yields any: PR files, then
   * base...head compare, then each PR commit, then the raw diff.
   */
  async collectFiles(repo: RepoRef, pr: PrContext): Promise<CommitFile[]> {
    const { codeHost } = this.deps;
    const strategies: Array<[string, () => Promise<CommitFile[]>]> = [
      ["pull_files", () => codeHost.listPullFiles(repo, pr.number)],
    ];
    if (pr.baseSha && pr.headSha) {
      strategies.push(["compare", () => codeHost.compareCommits(repo, pr.baseSha, pr.headSha)]);
    }
    strategies.push([
      "commits",
      async () => {
        const files: CommitFile[] = [];
        for (const sha of await codeHost.listPullCommits(repo, pr.number)) {
          try {
            files.push(...(await codeHost.getCommit(repo, sha)).files);
          } catch (err) {
            this.logger.warn({ err, sha }, "Commit lookup failed");
          }
        }
        return files;
      },
    ]);
    strategies.push(["raw_diff", async () => parseUnifiedDiff(await codeHost.getPullDiff(repo, pr.number))]);

    for (const [name, strategy] of strategies) {
      try {
        const files = mergeFilesByPath(await strategy());
        if (files.length > 0) {
          this.logger.debug({ strategy: name, files: files.length }, "Collected PR files");
          return files;
        }
      } catch (err) {
        this.logger.warn({ err, strategy: name, pr: pr.number }, "PR file strategy failed");
      }
    }
    return [];
  }

  async run(payload: unknown): Promise<WorkflowResult> {
    const pr = parsePrContext(payload);
    if (!PR_ACTIONS.has(pr.action)) {
      return { status: "skipped", model: null, result: { reason: `unsupported action '${pr.action}'` } };
    }
    if (!pr.number || !pr.owner || !pr.repo) {
      return { status: "skipped", model: null, result: { reason: "missing pull request metadata" } };
    }
    const repo: RepoRef = { owner: pr.owner, repo: pr.repo };
    const files = await this.collectFiles(repo, pr);
    const result = { pr_number: pr.number, ticket_key: pr.ticketKey || null, files: files.length };

    // Our own body update comes back as an `edited` webhook; the fingerprint stops it there.
    const fingerprint = changeFingerprint({ ticketKey: pr.ticketKey, title: pr.title, files });
    if (readFingerprint(pr.body) === fingerprint) {
      this.logger.debug({ pr: pr.number }, "Details block already matches these changes");
      return { status: "unchanged", model: null, result };
    }

    let model: string | null = null;
    let sections: PrSections | null = null;
    const diff = buildDiffContext(files);
    if (diff) {
      const session = openSession(this.deps, this.logger);
      const generated = await session.generate(sectionsPrompt({ ticketKey: pr.ticketKey, title: pr.title, diff }));
      model = generated.model;
      sections = parseSections(generated.text);
      if (!sections) this.logger.warn({ pr: pr.number }, "PR sections were not valid JSON; using file categories");
    }
    sections ??= ruleBasedSections({ ticketKey: pr.ticketKey, title: pr.title, files });

    const block = renderDetailsBlock({ ticketKey: pr.ticketKey, sections, files, fingerprint });
    const body = upsertDetailsBlock(pr.body, block);
    if (body === pr.body.trim()) {
      return { status: "unchanged", model, result };
    }

    confirmWrite("GitHub PR update", await this.deps.codeHost.updatePullRequest(repo, pr.number, { body }));
    this.deps.recorder.recordEvent({
      eventType: "pr_description_updated",
      workflow: "pr_description",
      ticketKey: pr.ticketKey || null,
      payload: { ...result, repo: `${pr.owner}/${pr.repo}`, action: pr.action, url: pr.url, model },
    });
    this.logger.info({ pr: pr.number, files: files.length }, "PR description updated");
    return { status: "processed", model, result };
  }
}
