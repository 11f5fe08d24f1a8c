import { requestJson } from "./http.js";
import type { DocumentClient } from "./types.js";
import { asArray, asRecord, asString } from "../utils/text.js";

const DOCS_API = "https://docs.googleapis.com/v1/documents";

/** Concatenates the text runs of a Docs `documents.get` body, one paragraph per line. */
export function documentToText(document: unknown): string {
  const content = asArray(asRecord(asRecord(document)["body"])["content"]);
  const paragraphs: string[] = [];
  for (const element of content) {
    const paragraph = asRecord(asRecord(element)["paragraph"]);
    const runs = asArray(paragraph["elements"])
      .map((run) => asString(asRecord(asRecord(run)["textRun"])["content"]))
      .join("");
    const line = runs.replace(/\n+$/, "");
    if (line.trim()) paragraphs.push(line);
  }
  return paragraphs.join("\n");
}

export class GoogleDocsClient implements DocumentClient {
  constructor(
    private readonly accessToken: string,
    private readonly timeoutMs?: number,
  ) {}

  async getDocumentText(documentId: string): Promise<string> {
    const document = await requestJson(`${DOCS_API}/${encodeURIComponent(documentId)}`, {
      headers: { Authorization: `Bearer ${this.accessToken}`, Accept: "application/json" },
      timeoutMs: this.timeoutMs,
    });
    return documentToText(document);
  }
}
