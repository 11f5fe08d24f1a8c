import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { cleanLines } from "../utils/text.js";

export const REQUIRED_SECTIONS = [
  "## Task",
  "## Context",
  "## Key Files",
  "## Constraints",
  "## Implementation Rules",
  "## Expected Output",
] as const;

const MAX_SECTION_LINES = 4;

export function hasRequiredSections(markdown: string): boolean {
  return REQUIRED_SECTIONS.every((section) => markdown.includes(section));
}

export interface PromptArtifactInput {
  readonly issueKey: string;
  readonly summary: string;
  readonly gatheredContext: string;
  readonly keyFilesMarkdown: string;
  readonly ruleset: string;
}

/** Keeps the model's document when it has every required heading, else builds one that does. */
export function normalizePromptMarkdown(modelText: string, input: PromptArtifactInput): string {
  if (modelText && hasRequiredSections(modelText)) return `${modelText.trim()}\n`;

  const constraints = [
    "- Stay aligned with Jira scope and linked context.",
    "- Keep output paste-ready for the assignee.",
    "- Follow repository standards and existing patterns.",
  ].join("\n");

  return [
    "## Task",
    `- Ticket: ${input.issueKey}`,
    `- Summary: ${input.summary.trim() || "No summary provided."}`,
    "",
    "## Context",
    input.gatheredContext.trim() || "No additional context gathered.",
    "",
    "## Key Files",
    input.keyFilesMarkdown.trim() || "- No key files were identified.",
    "",
    "## Constraints",
    constraints,
    "",
    "## Implementation Rules",
    input.ruleset.trim() || "- No ruleset content found; use backend defaults.",
    "",
    "## Expected Output",
    modelText.trim() || "Provide an implementation-ready prompt.",
    "",
  ].join("\n");
}

export function safeFileKey(issueKey: string): string {
  return (issueKey || "UNKNOWN").replace(/[^A-Za-z0-9_.-]/g, "-");
}

export function promptFileName(issueKey: string): string {
  return `prompt-${safeFileKey(issueKey)}.md`;
}

/** Writes the artifact and returns its absolute path. */
export function writePromptFile(dir: string, issueKey: string, markdown: string): string {
  mkdirSync(dir, { recursive: true });
  const path = resolve(join(dir, promptFileName(issueKey)));
  writeFileSync(path, markdown, "utf-8");
  return path;
}

export function extractSection(markdown: string, heading: string): string {
  const start = markdown.indexOf(`${heading}\n`);
  if (start === -1) return "";
  const bodyStart = start + heading.length + 1;
  const next = markdown.indexOf("\n## ", bodyStart - 1);
  return (next === -1 ? markdown.slice(bodyStart) : markdown.slice(bodyStart, next)).trim();
}

export interface WritebackInput {
  readonly issueKey: string;
  readonly summary: string;
  readonly repoOwner: string;
  readonly repoName: string;
  readonly keyFilesMarkdown: string;
}

export function buildDescriptionText(input: WritebackInput & { promptMarkdown: string }): string {
  const constraints = cleanLines(extractSection(input.promptMarkdown, "## Constraints"), MAX_SECTION_LINES);
  const outputs = cleanLines(extractSection(input.promptMarkdown, "## Expected Output"), MAX_SECTION_LINES);
  const keyFiles = cleanLines(input.keyFilesMarkdown, MAX_SECTION_LINES);
  return [
    `Technical implementation guidance for ${input.issueKey}: ${input.summary.trim() || "No summary provided."}`,
    `Repository target: ${input.repoOwner}/${input.repoName}.`,
    "Key files to inspect first:",
    ...(keyFiles.length > 0 ? keyFiles : ["No key files were identified."]),
    "Constraints:",
    ...(constraints.length > 0 ? constraints : ["Respect existing Jira scope and repository patterns."]),
    "Expected output:",
    ...(outputs.length > 0 ? outputs : ["Code changes, tests, and docs updates where needed."]),
    "See the attached prompt file for full implementation rules and team preferences.",
  ].join("\n");
}

export function buildCommentText(input: WritebackInput & { sameLabelHistory: string }): string {
  const history = cleanLines(input.sameLabelHistory, MAX_SECTION_LINES);
  const keyFiles = cleanLines(input.keyFilesMarkdown, MAX_SECTION_LINES);
  return [
    "Previous same-label progress:",
    ...(history.length > 0 ? history : ["No completed same-label tickets found."]),
    "Recommended implementation path for current task:",
    `Target repository: ${input.repoOwner}/${input.repoName}.`,
    `Issue scope: ${input.issueKey} - ${input.summary.trim() || "No summary provided."}`,
    ...(keyFiles.length > 0 ? keyFiles : ["No key files were identified."]),
    "Validate behavior with focused tests before marking done.",
  ].join("\n");
}
