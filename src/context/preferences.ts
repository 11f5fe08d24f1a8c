import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { DocumentClient } from "../integrations/types.js";
import type { PreferenceCategory } from "../config/types.js";
import type { MemoryItem } from "../memory/types.js";
import { ConfigurationError, ExecutionError, errorMessage } from "../workflows/errors.js";
import { normalizeTokens } from "../utils/text.js";

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [PreferenceCategory, ReadonlySet<string>]> = [
  ["frontend", new Set(["frontend", "front", "ui", "ux", "fe", "client", "react", "web"])],
  ["database", new Set(["database", "db", "sql", "schema", "migration", "postgres", "query"])],
  ["backend", new Set(["backend", "back", "api", "service", "be", "server"])],
];

const RULESET_FILES: Readonly<Record<PreferenceCategory, string>> = {
  frontend: "frontend-ruleset.md",
  backend: "backend-ruleset.md",
  database: "db-ruleset.md",
};

export function isPreferenceCategory(value: string): value is PreferenceCategory {
  return value === "frontend" || value === "backend" || value === "database";
}

/** First category whose keywords meet a label/component token; backend otherwise. */
export function resolvePreferenceCategory(
  labels: readonly string[],
  componentNames: readonly string[],
): PreferenceCategory {
  const tokens = [...normalizeTokens(labels), ...normalizeTokens(componentNames)];
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (tokens.some((token) => keywords.has(token))) return category;
  }
  return "backend";
}

export function rulesetFileName(category: PreferenceCategory): string {
  return RULESET_FILES[category];
}

export function loadRuleset(templatesDir: string, category: PreferenceCategory): string {
  const path = join(templatesDir, rulesetFileName(category));
  if (!existsSync(path)) return "";
  return readFileSync(path, "utf-8");
}

/**
 * Team preferences live in one document per category. A missing document id
 * or an unreadable/empty document fails the workflow.
 */
export async function loadPreferences(
  docs: DocumentClient,
  documentIds: Readonly<Partial<Record<PreferenceCategory, string>>>,
  category: PreferenceCategory,
): Promise<string> {
  const documentId = documentIds[category];
  if (!documentId) {
    throw new ConfigurationError(`No preference document configured for category "${category}"`);
  }
  let text: string;
  try {
    text = await docs.getDocumentText(documentId);
  } catch (err) {
    throw new ExecutionError(`Failed to fetch preferences for ${category}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!text.trim()) {
    throw new ExecutionError(`Preferences document for ${category} is empty`);
  }
  return text.trim();
}

export function appendLeaderRules(preferences: string, rules: readonly MemoryItem[]): string {
  if (rules.length === 0) return preferences;
  const lines = rules.map((rule) => `- ${rule.summary}`);
  return `${preferences}\n\nTech lead rules:\n${lines.join("\n")}`;
}
