import type { CommitSummary } from "../integrations/types.js";
import { normalizeTokens } from "../utils/text.js";

export const MAX_KEY_FILES = 8;

export type Confidence = "high" | "medium" | "low";

export interface KeyFile {
  readonly path: string;
  readonly why: string;
  readonly confidence: Confidence;
}

const KEY_FILE_PATTERN =
  /^KEY_FILE:\s*(?<path>[^|]+?)\s*\|\s*WHY:\s*(?<why>[^|]+?)\s*\|\s*CONFIDENCE:\s*(?<confidence>\w+)\s*$/i;

function toConfidence(value: string): Confidence {
  const lowered = value.toLowerCase();
  return lowered === "high" || lowered === "low" ? lowered : "medium";
}

/** Reads `KEY_FILE: path | WHY: reason | CONFIDENCE: level` lines, deduplicated by path. */
export function parseKeyFiles(text: string, limit = MAX_KEY_FILES): KeyFile[] {
  const seen = new Set<string>();
  const parsed: KeyFile[] = [];
  for (const raw of text.split("\n")) {
    let line = raw.trim();
    if (line.startsWith("- ") || line.startsWith("* ")) line = line.slice(2).trim();
    const groups = KEY_FILE_PATTERN.exec(line)?.groups;
    if (!groups) continue;

    const path = (groups["path"] ?? "").trim().replace(/^`+|`+$/g, "");
    const why = (groups["why"] ?? "").trim();
    if (!path || !why || seen.has(path.toLowerCase())) continue;

    seen.add(path.toLowerCase());
    parsed.push({ path, why, confidence: toConfidence(groups["confidence"] ?? "") });
    if (parsed.length >= limit) break;
  }
  return parsed;
}

export function formatKeyFilesMarkdown(keyFiles: readonly KeyFile[]): string {
  return keyFiles.map((file) => `- \`${file.path}\` - ${file.why} (confidence: ${file.confidence})`).join("\n");
}

/**
 * Fallback when the model names no key files: paths touched by recent commits,
 * ranked by how many ticket tokens they share, then by how often they changed.
 */
export function rankCandidateFiles(
  commits: readonly CommitSummary[],
  ticketText: string,
  limit = MAX_KEY_FILES,
): KeyFile[] {
  const tokens = new Set(normalizeTokens(ticketText.split(/\s+/)).filter((token) => token.length > 2));
  const touched = new Map<string, number>();
  for (const commit of commits) {
    for (const file of commit.files) {
      touched.set(file.filename, (touched.get(file.filename) ?? 0) + 1);
    }
  }

  const scored = [...touched.entries()].map(([path, changes]) => {
    const overlap = normalizeTokens([path]).filter((token) => tokens.has(token)).length;
    return { path, changes, overlap };
  });
  scored.sort((a, b) => b.overlap - a.overlap || b.changes - a.changes || a.path.localeCompare(b.path));

  return scored.slice(0, limit).map(({ path, changes, overlap }) => ({
    path,
    why:
      overlap > 0
        ? `matches ticket terms and changed in ${changes} recent commit(s)`
        : `changed in ${changes} recent commit(s)`,
    confidence: overlap > 1 ? "high" : overlap === 1 ? "medium" : "low",
  }));
}
