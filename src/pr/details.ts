import { createHash } from "node:crypto";
import { z } from "zod";
import type { CommitFile } from "../integrations/types.js";

export const DETAILS_START = "<!-- leadsync:pr-details:start -->";
export const DETAILS_END = "<!-- leadsync:pr-details:end -->";

const FINGERPRINT_PATTERN = /<!-- leadsync:pr-details:fingerprint=([0-9a-f]+) -->/;

export type FileCategory = "Backend" | "Frontend" | "Database" | "Testing" | "Documentation";

const CATEGORY_ORDER: readonly FileCategory[] = ["Backend", "Frontend", "Database", "Testing", "Documentation"];

export function categoryForPath(path: string): FileCategory {
  const lowered = path.toLowerCase();
  if (["test", "spec", "__tests__"].some((token) => lowered.includes(token))) return "Testing";
  if (["ui/", "frontend", "web/", "components/", "pages/"].some((token) => lowered.includes(token))) {
    return "Frontend";
  }
  if (["db/", "database", "migration", "schema", "sql"].some((token) => lowered.includes(token))) {
    return "Database";
  }
  if (["docs/", "readme", ".md"].some((token) => lowered.includes(token))) return "Documentation";
  return "Backend";
}

export function groupFiles(files: readonly CommitFile[]): Map<FileCategory, CommitFile[]> {
  const grouped = new Map<FileCategory, CommitFile[]>(CATEGORY_ORDER.map((category) => [category, []]));
  for (const file of files) grouped.get(categoryForPath(file.filename))?.push(file);
  return grouped;
}

export interface PrSections {
  readonly summary: string;
  readonly implementationDetails: string[];
  readonly suggestedValidation: string[];
}

const lineList = z
  .array(z.unknown())
  .transform((items) => items.map((item) => String(item).trim()).filter((item) => item.length > 0));

const sectionsSchema = z.object({
  summary: z.string().trim().min(1),
  implementation_details: lineList.pipe(z.array(z.string()).min(1)),
  suggested_validation: lineList.optional(),
});

/**
 * Reads the model's JSON answer (bare or in a ```json fence). Returns null
 * when it is missing, malformed or lacks a summary or implementation details.
 */
export function parseSections(text: string): PrSections | null {
  const trimmed = text.trim();
  const fenced = /```json\s*(\{[\s\S]*\})\s*```/.exec(trimmed)?.[1] ?? trimmed;
  const start = fenced.indexOf("{");
  const end = fenced.lastIndexOf("}");
  if (start < 0 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fenced.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = sectionsSchema.safeParse(raw);
  if (!parsed.success) return null;
  const validation = parsed.data.suggested_validation ?? [];
  return {
    summary: parsed.data.summary,
    implementationDetails: parsed.data.implementation_details,
    suggestedValidation:
      validation.length > 0 ? validation : ["Run relevant unit/integration tests for touched modules."],
  };
}

/** Sections derived from file categories alone, used when the model gives nothing usable. */
export function ruleBasedSections(params: { ticketKey: string; title: string; files: readonly CommitFile[] }): PrSections {
  const grouped = groupFiles(params.files);
  const touched = CATEGORY_ORDER.filter((category) => (grouped.get(category)?.length ?? 0) > 0);
  const summary = params.title || params.ticketKey || "PR update";

  const validation = [
    (grouped.get("Testing")?.length ?? 0) > 0
      ? "Includes test file changes; run unit/integration suite for touched modules."
      : "No test files detected in this PR; validate if tests should be added.",
  ];
  if ((grouped.get("Database")?.length ?? 0) > 0) {
    validation.push("Database-related changes detected; verify migrations and backward compatibility.");
  }
  if ((grouped.get("Frontend")?.length ?? 0) > 0) {
    validation.push("Frontend changes detected; verify UI behavior manually in staging.");
  }

  return {
    summary,
    implementationDetails: [
      `This PR focuses on: ${summary}.`,
      `Main code areas changed: ${touched.length > 0 ? touched.join(", ") : "Backend"}.`,
      "Changes were inferred directly from the modified files list.",
    ],
    suggestedValidation: validation,
  };
}

/**
 * Identifies the inputs a details block was built from. Edits to the body
 * alone leave it unchanged, so the block is regenerated only for new code.
 */
export function changeFingerprint(params: { ticketKey: string; title: string; files: readonly CommitFile[] }): string {
  const hash = createHash("sha256");
  hash.update(JSON.stringify([params.ticketKey, params.title]));
  for (const file of params.files) {
    hash.update(JSON.stringify([file.filename, file.status, file.patch]));
  }
  return hash.digest("hex").slice(0, 16);
}

/** Fingerprint stored inside the managed block of `body`, if any. */
export function readFingerprint(body: string): string | null {
  const start = body.indexOf(DETAILS_START);
  const end = body.indexOf(DETAILS_END);
  if (start === -1 || end <= start) return null;
  return FINGERPRINT_PATTERN.exec(body.slice(start, end))?.[1] ?? null;
}

function renderFiles(files: readonly CommitFile[], maxFiles = 15): string[] {
  if (files.length === 0) return ["- No changed files detected."];
  const lines = files
    .slice(0, maxFiles)
    .map((file) => `- \`${file.filename}\` (${file.status}, +${file.additions}/-${file.deletions})`);
  if (files.length > maxFiles) lines.push(`- ... and ${files.length - maxFiles} more files`);
  return lines;
}

export function renderDetailsBlock(params: {
  ticketKey: string;
  sections: PrSections;
  files: readonly CommitFile[];
  fingerprint?: string;
}): string {
  return [
    DETAILS_START,
    ...(params.fingerprint ? [`<!-- leadsync:pr-details:fingerprint=${params.fingerprint} -->`] : []),
    "## Summary",
    params.sections.summary,
    "",
    "## Context",
    `- Ticket key: ${params.ticketKey || "not detected from branch/title/body"}`,
    "- Auto-generated from code changes.",
    "",
    "## Implementation Details",
    ...params.sections.implementationDetails.map((line) => `- ${line}`),
    "",
    "## Files Changed",
    ...renderFiles(params.files),
    "",
    "## Suggested Validation",
    ...params.sections.suggestedValidation.map((line) => `- ${line}`),
    DETAILS_END,
  ].join("\n");
}

/** Replaces the managed block in `body`, or appends it. Text outside the markers is kept. */
export function upsertDetailsBlock(body: string, block: string): string {
  const trimmed = body.trim();
  const start = trimmed.indexOf(DETAILS_START);
  const end = trimmed.indexOf(DETAILS_END);
  if (start !== -1 && end > start) {
    const before = trimmed.slice(0, start).trimEnd();
    const after = trimmed.slice(end + DETAILS_END.length).trimStart();
    return `${before}\n\n${block}\n\n${after}`.trim();
  }
  return trimmed ? `${trimmed}\n\n${block}` : block;
}
