import { requestJson, requestText } from "./http.js";
import type { CodeHostClient, CommitFile, CommitSummary, RepoRef } from "./types.js";
import { asArray, asNumber, asRecord, asString, isRecord } from "../utils/text.js";

export interface GitHubClientConfig {
  readonly token: string;
  readonly apiUrl: string;
  readonly timeoutMs?: number;
}

export function toCommitFile(raw: unknown): CommitFile | null {
  const item = asRecord(raw);
  const filename = (asString(item["filename"]) || asString(item["path"])).trim();
  if (!filename) return null;
  return {
    filename,
    status: asString(item["status"]) || "modified",
    additions: asNumber(item["additions"]),
    deletions: asNumber(item["deletions"]),
    patch: asString(item["patch"]),
  };
}

function toCommitFiles(raw: unknown): CommitFile[] {
  return asArray(raw).flatMap((item) => {
    const file = toCommitFile(item);
    return file ? [file] : [];
  });
}

export function toCommitSummary(raw: unknown): CommitSummary {
  const item = asRecord(raw);
  const commit = asRecord(item["commit"]);
  const author = asRecord(commit["author"]);
  const login = asString(asRecord(item["author"])["login"]);
  return {
    sha: asString(item["sha"]),
    message: asString(commit["message"]),
    author: asString(author["name"]) || login || "unknown",
    date: asString(author["date"]),
    url: asString(item["html_url"]),
    files: toCommitFiles(item["files"]),
  };
}

/** GitHub REST v3 with a bearer token. */
export class GitHubRestClient implements CodeHostClient {
  private readonly apiUrl: string;

  constructor(private readonly config: GitHubClientConfig) {
    this.apiUrl = config.apiUrl.replace(/\/$/, "");
  }

  private headers(accept = "application/vnd.github+json"): Record<string, string> {
    return {
      Accept: accept,
      Authorization: `Bearer ${this.config.token}`,
      "X-GitHub-Api-Version": "2022-11-28",
      "Content-Type": "application/json",
    };
  }

  private call(path: string, method = "GET", body?: unknown): Promise<unknown> {
    return requestJson(`${this.apiUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
      timeoutMs: this.config.timeoutMs,
    });
  }

  private repoPath(repo: RepoRef): string {
    return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.repo)}`;
  }

  /** Lists commits, then loads each one to get its changed files. */
  async listCommits(
    repo: RepoRef,
    params: { branch: string; since?: string; limit?: number },
  ): Promise<CommitSummary[]> {
    const query = new URLSearchParams({ sha: params.branch, per_page: String(params.limit ?? 30) });
    if (params.since) query.set("since", params.since);
    const listed = asArray(await this.call(`${this.repoPath(repo)}/commits?${query.toString()}`));
    const commits: CommitSummary[] = [];
    for (const item of listed) {
      const sha = asString(asRecord(item)["sha"]);
      if (!sha) continue;
      commits.push(await this.getCommit(repo, sha));
    }
    return commits;
  }

  async listPullFiles(repo: RepoRef, pullNumber: number): Promise<CommitFile[]> {
    return toCommitFiles(await this.call(`${this.repoPath(repo)}/pulls/${pullNumber}/files?per_page=100`));
  }

  async compareCommits(repo: RepoRef, base: string, head: string): Promise<CommitFile[]> {
    const data = asRecord(
      await this.call(`${this.repoPath(repo)}/compare/${encodeURIComponent(base)}...${encodeURIComponent(head)}`),
    );
    return toCommitFiles(data["files"]);
  }

  async listPullCommits(repo: RepoRef, pullNumber: number): Promise<string[]> {
    const data = asArray(await this.call(`${this.repoPath(repo)}/pulls/${pullNumber}/commits?per_page=100`));
    return data
      .filter(isRecord)
      .map((item) => asString(item["sha"]))
      .filter((sha) => sha.length > 0);
  }

  async getCommit(repo: RepoRef, sha: string): Promise<CommitSummary> {
    return toCommitSummary(await this.call(`${this.repoPath(repo)}/commits/${encodeURIComponent(sha)}`));
  }

  getPullDiff(repo: RepoRef, pullNumber: number): Promise<string> {
    return requestText(`${this.apiUrl}${this.repoPath(repo)}/pulls/${pullNumber}`, {
      headers: this.headers("application/vnd.github.v3.diff"),
      timeoutMs: this.config.timeoutMs,
    });
  }

  updatePullRequest(
    repo: RepoRef,
    pullNumber: number,
    fields: { body?: string; title?: string },
  ): Promise<unknown> {
    return this.call(`${this.repoPath(repo)}/pulls/${pullNumber}`, "PATCH", fields);
  }

  addIssueComment(repo: RepoRef, issueNumber: number, text: string): Promise<unknown> {
    return this.call(`${this.repoPath(repo)}/issues/${issueNumber}/comments`, "POST", { body: text });
  }
}
