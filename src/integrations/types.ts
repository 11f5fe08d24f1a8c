import type { JsonRecord } from "../utils/text.js";

export interface TrackerComment {
  readonly id: string;
  readonly body: string;
}

export interface TrackerTransition {
  readonly id: string;
  readonly name: string;
}

export interface AttachmentFile {
  readonly filename: string;
  readonly content: string;
  readonly contentType?: string;
}

/** Ticket tracker operations the workflows use. Writes resolve with the raw response envelope. */
export interface TrackerClient {
  getIssue(key: string): Promise<JsonRecord>;
  editIssue(key: string, fields: JsonRecord): Promise<unknown>;
  addComment(key: string, text: string): Promise<unknown>;
  addAttachment(key: string, file: AttachmentFile): Promise<unknown>;
  searchIssues(jql: string, fields: readonly string[], limit: number): Promise<JsonRecord[]>;
  listComments(key: string): Promise<TrackerComment[]>;
  listTransitions(key: string): Promise<TrackerTransition[]>;
  transitionIssue(key: string, transitionId: string): Promise<unknown>;
}

export interface RepoRef {
  readonly owner: string;
  readonly repo: string;
}

export interface CommitFile {
  readonly filename: string;
  readonly status: string;
  readonly additions: number;
  readonly deletions: number;
  readonly patch: string;
}

export interface CommitSummary {
  readonly sha: string;
  readonly message: string;
  readonly author: string;
  readonly date: string;
  readonly url: string;
  readonly files: readonly CommitFile[];
}

export interface CodeHostClient {
  listCommits(repo: RepoRef, params: { branch: string; since?: string; limit?: number }): Promise<CommitSummary[]>;
  listPullFiles(repo: RepoRef, pullNumber: number): Promise<CommitFile[]>;
  compareCommits(repo: RepoRef, base: string, head: string): Promise<CommitFile[]>;
  listPullCommits(repo: RepoRef, pullNumber: number): Promise<string[]>;
  getCommit(repo: RepoRef, sha: string): Promise<CommitSummary>;
  getPullDiff(repo: RepoRef, pullNumber: number): Promise<string>;
  updatePullRequest(repo: RepoRef, pullNumber: number, fields: { body?: string; title?: string }): Promise<unknown>;
  addIssueComment(repo: RepoRef, issueNumber: number, text: string): Promise<unknown>;
}

export interface ChatClient {
  postMessage(params: { channel: string; text: string; threadTs?: string }): Promise<unknown>;
}

export interface DocumentClient {
  getDocumentText(documentId: string): Promise<string>;
}
