import { requestJson } from "./http.js";
import type { AttachmentFile, TrackerClient, TrackerComment, TrackerTransition } from "./types.js";
import { asArray, asRecord, asString, extractText, isRecord } from "../utils/text.js";
import type { JsonRecord } from "../utils/text.js";

export interface JiraClientConfig {
  readonly baseUrl: string;
  readonly email: string;
  readonly apiToken: string;
  readonly timeoutMs?: number;
}

/** Plain text as an Atlassian document: one paragraph per line. */
export function toAdf(text: string): JsonRecord {
  return {
    type: "doc",
    version: 1,
    content: text.split("\n").map((line) => ({
      type: "paragraph",
      content: line ? [{ type: "text", text: line }] : [],
    })),
  };
}

/** Jira Cloud REST v3. */
export class JiraRestClient implements TrackerClient {
  private readonly apiUrl: string;
  private readonly auth: string;

  constructor(private readonly config: JiraClientConfig) {
    const base = config.baseUrl.replace(/\/$/, "");
    this.apiUrl = base.endsWith("/rest/api/3") ? base : `${base}/rest/api/3`;
    this.auth = `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString("base64")}`;
  }

  private headers(json = true): Record<string, string> {
    return {
      Accept: "application/json",
      Authorization: this.auth,
      ...(json ? { "Content-Type": "application/json" } : {}),
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

  async getIssue(key: string): Promise<JsonRecord> {
    return asRecord(await this.call(`/issue/${encodeURIComponent(key)}`));
  }

  editIssue(key: string, fields: JsonRecord): Promise<unknown> {
    const converted: JsonRecord = {};
    for (const [name, value] of Object.entries(fields)) {
      converted[name] = name === "description" && typeof value === "string" ? toAdf(value) : value;
    }
    return this.call(`/issue/${encodeURIComponent(key)}`, "PUT", { fields: converted });
  }

  addComment(key: string, text: string): Promise<unknown> {
    return this.call(`/issue/${encodeURIComponent(key)}/comment`, "POST", { body: toAdf(text) });
  }

  addAttachment(key: string, file: AttachmentFile): Promise<unknown> {
    const form = new FormData();
    form.append(
      "file",
      new Blob([file.content], { type: file.contentType ?? "text/markdown" }),
      file.filename,
    );
    return requestJson(`${this.apiUrl}/issue/${encodeURIComponent(key)}/attachments`, {
      method: "POST",
      headers: { ...this.headers(false), "X-Atlassian-Token": "no-check" },
      body: form,
      timeoutMs: this.config.timeoutMs,
    });
  }

  async searchIssues(jql: string, fields: readonly string[], limit: number): Promise<JsonRecord[]> {
    const params = new URLSearchParams({
      jql,
      fields: fields.join(","),
      maxResults: String(limit),
    });
    const data = asRecord(await this.call(`/search/jql?${params.toString()}`));
    return asArray(data["issues"]).filter(isRecord);
  }

  async listComments(key: string): Promise<TrackerComment[]> {
    const data = asRecord(await this.call(`/issue/${encodeURIComponent(key)}/comment?maxResults=100`));
    return asArray(data["comments"])
      .filter(isRecord)
      .map((comment) => ({
        id: asString(comment["id"]),
        body: extractText(comment["body"], "\n"),
      }));
  }

  async listTransitions(key: string): Promise<TrackerTransition[]> {
    const data = asRecord(await this.call(`/issue/${encodeURIComponent(key)}/transitions`));
    return asArray(data["transitions"])
      .filter(isRecord)
      .map((transition) => ({ id: asString(transition["id"]), name: asString(transition["name"]) }));
  }

  transitionIssue(key: string, transitionId: string): Promise<unknown> {
    return this.call(`/issue/${encodeURIComponent(key)}/transitions`, "POST", {
      transition: { id: transitionId },
    });
  }
}
