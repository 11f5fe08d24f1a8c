import type { Logger } from "../logging/logger.js";
import type { CommitSummary } from "../integrations/types.js";
import { confirmWrite } from "../integrations/response.js";
import {
  digestLabel,
  digestLockKey,
  fallbackBlocks,
  formatDigestMessage,
  groupCommitsByArea,
  heartbeatBlock,
  hourBucketStart,
  normalizeBucket,
  parseDigestBlocks,
} from "../digest/blocks.js";
import type { AreaGroup, DigestBlock } from "../digest/blocks.js";
import { ConfigurationError, ExecutionError, errorMessage } from "./errors.js";
import { currentTime, openSession, requireRepo } from "./types.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

export type RunSource = "manual" | "scheduled";

export interface DigestRequest {
  readonly runSource?: RunSource;
  /**
   * Any timestamp inside the hour this run covers; it is reduced to the hour
   * bucket and enables the idempotency lock. Scheduled runs default to the
   * current hour.
   */
  readonly bucketStartUtc?: string | null;
  readonly windowMinutes?: number;
  readonly repoOwner?: string | null;
  readonly repoName?: string | null;
}

const PATCH_LINES = 30;

function describeCommits(groups: readonly AreaGroup[]): string {
  const lines: string[] = [];
  for (const group of groups) {
    lines.push(`Area candidate: ${group.area}`);
    for (const commit of group.commits) {
      lines.push(`- SHA: ${commit.sha.slice(0, 7)} AUTHOR: ${commit.author}`);
      lines.push(`  MESSAGE: ${commit.message.trim()}`);
      for (const file of commit.files) {
        lines.push(`  FILE: ${file.filename} (${file.status}, +${file.additions}/-${file.deletions})`);
        const patch = file.patch.split("\n");
        if (file.patch) {
          lines.push(...patch.slice(0, PATCH_LINES).map((line) => `    ${line}`));
          if (patch.length > PATCH_LINES) lines.push("    ...truncated");
        }
      }
    }
  }
  return lines.join("\n");
}

export function digestPrompt(params: { windowMinutes: number; repo: string; commits: string }): string {
  return [
    `Draft a technically detailed ${digestLabel(params.windowMinutes).toLowerCase()} engineering digest ` +
      `for ${params.repo} from the commits below.`,
    "Group commits by subsystem or area. Read the patches and name specific functions and logic changes.",
    "For EACH area output one block in this exact format:",
    "---",
    "AREA: <area name>",
    "AUTHORS: <comma-separated commit authors>",
    "COMMITS: <number of commits>",
    "FILES: <comma-separated key files with (A)/(M)/(D) markers>",
    "CHANGES:",
    "- <specific code-level change>",
    "SUMMARY: <2-3 sentences>",
    "DECISIONS: <key decisions or risks, or 'None.'>",
    "---",
    "Maximum 8 area blocks. Attribute work to specific authors.",
    "Commits:",
    params.commits,
  ].join("\n");
}

/** Commit digest for one time window, posted once per hour bucket. */
export class DigestWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "daily_digest" });
  }

  private resolveBucket(requested: string | null | undefined, runSource: RunSource): string | null {
    const raw = requested?.trim();
    if (raw) {
      const bucket = normalizeBucket(raw);
      if (!bucket) throw new ConfigurationError("bucket_start_utc must be an ISO-8601 timestamp.");
      return bucket;
    }
    return runSource === "scheduled" ? hourBucketStart(currentTime(this.deps)) : null;
  }

  async run(request: DigestRequest = {}): Promise<WorkflowResult> {
    const { config, recorder } = this.deps;
    const runSource = request.runSource ?? "manual";
    const windowMinutes = request.windowMinutes ?? config.digest.windowMinutes;
    const bucket = this.resolveBucket(request.bucketStartUtc, runSource);
    const repo = requireRepo(this.deps, { owner: request.repoOwner, repo: request.repoName });
    const repoLabel = `${repo.owner}/${repo.repo}`;
    const channel = config.slack.channelId;
    if (!channel) throw new ConfigurationError("slack.channelId is required for the digest");

    if (config.digest.idempotency && bucket) {
      const lockKey = digestLockKey(bucket, windowMinutes, runSource);
      if (!recorder.acquireIdempotencyLock("daily_digest", lockKey)) {
        this.logger.info({ lockKey }, "Skipping duplicate digest bucket");
        return {
          status: "skipped",
          model: null,
          result: { reason: "duplicate_bucket", bucket_start_utc: bucket, lock_key: lockKey },
        };
      }
    }

    const since = new Date(currentTime(this.deps).getTime() - windowMinutes * 60_000);
    let commits: CommitSummary[];
    try {
      commits = await this.deps.codeHost.listCommits(repo, {
        branch: config.github.branch,
        since: since.toISOString(),
        limit: 100,
      });
    } catch (err) {
      throw new ExecutionError(`Failed to list commits for ${repoLabel}: ${errorMessage(err)}`, { cause: err });
    }

    const groups = groupCommitsByArea(commits);
    let blocks: DigestBlock[];
    let model: string | null = null;
    if (commits.length === 0) {
      blocks = [heartbeatBlock(windowMinutes)];
    } else {
      const session = openSession(this.deps, this.logger);
      const generated = await session.generate(
        digestPrompt({ windowMinutes, repo: repoLabel, commits: describeCommits(groups) }),
      );
      model = generated.model;
      blocks = parseDigestBlocks(generated.text);
      if (blocks.length === 0) {
        this.logger.warn("Digest output had no parseable blocks; using commit grouping");
        blocks = fallbackBlocks(groups);
      }
    }

    const message = formatDigestMessage({ windowMinutes, repo: repoLabel, blocks });
    confirmWrite("Slack digest post", await this.deps.chat.postMessage({ channel, text: message }));

    const runInfo = { window_minutes: windowMinutes, run_source: runSource, bucket_start_utc: bucket };
    recorder.recordEvent({
      eventType: "github_commit_batch",
      workflow: "daily_digest",
      payload: {
        ...runInfo,
        repo: repoLabel,
        commit_count: commits.length,
        shas: commits.map((commit) => commit.sha),
      },
    });
    for (const block of blocks) {
      recorder.recordMemoryItem({
        itemType: "daily_digest_area",
        workflow: "daily_digest",
        component: block.area,
        repoKey: repoLabel,
        summary: block.summary,
        decision: block.decisions,
        context: {
          area: block.area,
          authors: block.authors,
          commits: block.commits,
          files: block.files,
          changes: block.changes,
        },
      });
    }
    recorder.recordEvent({
      eventType: "daily_digest_posted",
      workflow: "daily_digest",
      payload: { ...runInfo, repo: repoLabel, area_count: blocks.length, message },
    });

    this.logger.info({ repo: repoLabel, commits: commits.length, areas: blocks.length }, "Digest posted");
    return {
      status: "processed",
      model,
      result: { ...runInfo, repo: repoLabel, commit_count: commits.length, areas: blocks.map((b) => b.area), message },
    };
  }
}
