import type { CommitFile, CommitSummary } from "../integrations/types.js";

export const MAX_DIGEST_BLOCKS = 8;

const AREA_ROOTS = new Set(["src", "lib", "packages", "apps"]);

export interface DigestBlock {
  readonly area: string;
  readonly authors: string[];
  readonly commits: number;
  readonly files: string[];
  readonly changes: string[];
  readonly summary: string;
  readonly decisions: string;
}

export interface AreaGroup {
  readonly area: string;
  readonly commits: CommitSummary[];
}

/** `src/memory/db.ts` → memory, `docs/a.md` → docs, `README.md` → root. */
export function areaForPath(path: string): string {
  const segments = path.split("/").filter((segment) => segment.length > 0);
  if (segments.length <= 1) return "root";
  const [first, second] = segments;
  if (first && AREA_ROOTS.has(first) && second && segments.length > 2) return second;
  return first ?? "root";
}

function dominantArea(files: readonly CommitFile[]): string {
  const counts = new Map<string, number>();
  for (const file of files) {
    const area = areaForPath(file.filename);
    counts.set(area, (counts.get(area) ?? 0) + 1);
  }
  let best = "general";
  let bestCount = 0;
  for (const [area, count] of counts) {
    if (count > bestCount) {
      best = area;
      bestCount = count;
    }
  }
  return best;
}

/** Each commit lands in the area most of its files belong to; groups keep first-seen order. */
export function groupCommitsByArea(commits: readonly CommitSummary[]): AreaGroup[] {
  const groups = new Map<string, CommitSummary[]>();
  for (const commit of commits) {
    const area = dominantArea(commit.files);
    const list = groups.get(area) ?? [];
    list.push(commit);
    groups.set(area, list);
  }
  return [...groups.entries()].map(([area, list]) => ({ area, commits: list }));
}

function statusMarker(status: string): string {
  if (status === "added") return "A";
  if (status === "removed" || status === "deleted") return "D";
  return "M";
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values.filter((value) => value.length > 0))];
}

/** Deterministic blocks for when the model output cannot be parsed. */
export function fallbackBlocks(groups: readonly AreaGroup[]): DigestBlock[] {
  return groups.slice(0, MAX_DIGEST_BLOCKS).map((group) => {
    const files = unique(
      group.commits.flatMap((commit) =>
        commit.files.map((file) => `${file.filename} (${statusMarker(file.status)})`),
      ),
    );
    const subjects = group.commits.map((commit) => commit.message.split("\n")[0]?.trim() ?? "");
    return {
      area: group.area,
      authors: unique(group.commits.map((commit) => commit.author)),
      commits: group.commits.length,
      files: files.slice(0, 8),
      changes: unique(subjects).slice(0, 5),
      summary: `${group.commits.length} commit(s) touching ${group.area}.`,
      decisions: "None.",
    };
  });
}

export function heartbeatBlock(windowMinutes: number): DigestBlock {
  return {
    area: "general",
    authors: [],
    commits: 0,
    files: [],
    changes: ["No changes"],
    summary: `No commits in the last ${windowMinutes} minutes.`,
    decisions: "None.",
  };
}

function splitList(value: string): string[] {
  if (/^none\.?$/i.test(value.trim())) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseBlock(chunk: string): DigestBlock | null {
  const fields = new Map<string, string>();
  const changes: string[] = [];
  let inChanges = false;

  for (const raw of chunk.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    const field = /^([A-Z]+):\s*(.*)$/.exec(line);
    if (field?.[1]) {
      fields.set(field[1], field[2] ?? "");
      inChanges = field[1] === "CHANGES";
      continue;
    }
    if (inChanges && /^[-*•]\s+/.test(line)) {
      changes.push(line.replace(/^[-*•]\s+/, ""));
    }
  }

  const area = fields.get("AREA")?.trim();
  const summary = fields.get("SUMMARY")?.trim();
  if (!area || !summary) return null;
  const commits = Number.parseInt(fields.get("COMMITS") ?? "", 10);
  return {
    area,
    authors: splitList(fields.get("AUTHORS") ?? ""),
    commits: Number.isFinite(commits) ? commits : 0,
    files: splitList(fields.get("FILES") ?? ""),
    changes,
    summary,
    decisions: fields.get("DECISIONS")?.trim() || "None.",
  };
}

/** Parses `---`-delimited AREA blocks; at most eight are kept. */
export function parseDigestBlocks(text: string): DigestBlock[] {
  const blocks: DigestBlock[] = [];
  for (const chunk of text.split(/^\s*---\s*$/m)) {
    const block = parseBlock(chunk);
    if (block) blocks.push(block);
    if (blocks.length >= MAX_DIGEST_BLOCKS) break;
  }
  return blocks;
}

export function digestLabel(windowMinutes: number): "Daily" | "Hourly" {
  return windowMinutes >= 1440 ? "Daily" : "Hourly";
}

export function formatDigestMessage(params: {
  windowMinutes: number;
  repo: string;
  blocks: readonly DigestBlock[];
}): string {
  const lines = [`*[LeadSync ${digestLabel(params.windowMinutes)} Digest — ${params.repo}]*`];
  for (const block of params.blocks) {
    lines.push("");
    const authors = block.authors.length > 0 ? ` by ${block.authors.join(", ")}` : "";
    lines.push(`*${block.area}* (${block.commits} commits${authors})`);
    lines.push(block.summary);
    for (const change of block.changes) lines.push(`• ${change}`);
    if (block.files.length > 0) {
      lines.push(`Key files: ${block.files.map((file) => `\`${file}\``).join(", ")}`);
    }
    if (block.decisions !== "None.") lines.push(`_Decisions: ${block.decisions}_`);
  }
  return lines.join("\n");
}

export function digestLockKey(bucketStartUtc: string, windowMinutes: number, runSource: string): string {
  return `digest:${bucketStartUtc}:window=${windowMinutes}:source=${runSource}`;
}

/** Start of the UTC hour containing `at`, as `YYYY-MM-DDTHH:00:00Z`. */
export function hourBucketStart(at: Date): string {
  return `${at.toISOString().slice(0, 13)}:00:00Z`;
}

/** The hour bucket containing a timestamp, or null when `value` is not one. */
export function normalizeBucket(value: string): string | null {
  const at = new Date(value);
  return Number.isNaN(at.getTime()) ? null : hourBucketStart(at);
}
