import { z } from "zod";

const JIRA_KEY = /\b([A-Z][A-Z0-9]+-\d+)\b/;

const text = z.string().nullish().transform((value) => value ?? "");

const webhookSchema = z.object({
  action: text.transform((value) => value.toLowerCase()),
  pull_request: z
    .object({
      number: z.number().int().nonnegative().catch(0).default(0),
      html_url: text,
      title: text,
      body: text,
      head: z.object({ ref: text, sha: text }).partial().default({}),
      base: z.object({ sha: text }).partial().default({}),
    })
    .partial()
    .default({}),
  repository: z
    .object({
      name: text,
      owner: z.object({ login: text }).partial().default({}),
    })
    .partial()
    .default({}),
});

export interface PrContext {
  readonly action: string;
  readonly owner: string;
  readonly repo: string;
  readonly number: number;
  readonly url: string;
  readonly title: string;
  readonly body: string;
  readonly branch: string;
  readonly baseSha: string;
  readonly headSha: string;
  /** First Jira key in branch, title or body; empty when none. */
  readonly ticketKey: string;
}

export function extractTicketKey(...candidates: readonly string[]): string {
  for (const candidate of candidates) {
    const match = JIRA_KEY.exec(candidate);
    if (match?.[1]) return match[1];
  }
  return "";
}

/** Reads a GitHub `pull_request` webhook body. Missing fields come back empty, never undefined. */
export function parsePrContext(payload: unknown): PrContext {
  const parsed = webhookSchema.safeParse(payload);
  const data = parsed.success ? parsed.data : webhookSchema.parse({});
  const pr = data.pull_request;
  const title = pr.title ?? "";
  const body = pr.body ?? "";
  const branch = pr.head?.ref ?? "";
  return {
    action: data.action,
    owner: data.repository.owner?.login ?? "",
    repo: data.repository.name ?? "",
    number: pr.number ?? 0,
    url: pr.html_url ?? "",
    title,
    body,
    branch,
    baseSha: pr.base?.sha ?? "",
    headSha: pr.head?.sha ?? "",
    ticketKey: extractTicketKey(branch, title, body),
  };
}
