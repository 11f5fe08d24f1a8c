import type { CommitFile } from "../integrations/types.js";

/** Deduplicates by path in first-seen order, summing line counts and joining patches. */
export function mergeFilesByPath(files: readonly CommitFile[]): CommitFile[] {
  const merged = new Map<string, CommitFile>();
  for (const file of files) {
    const path = file.filename.trim();
    if (!path) continue;
    const previous = merged.get(path);
    const patch = file.patch.trim();
    if (!previous) {
      merged.set(path, { ...file, filename: path, patch });
      continue;
    }
    merged.set(path, {
      filename: path,
      status: file.status || previous.status,
      additions: previous.additions + file.additions,
      deletions: previous.deletions + file.deletions,
      patch: previous.patch && patch ? `${previous.patch}\n${patch}` : previous.patch || patch,
    });
  }
  return [...merged.values()];
}

function statusFromHeaders(headers: readonly string[]): string {
  const joined = headers.join("\n").toLowerCase();
  if (joined.includes("new file mode")) return "added";
  if (joined.includes("deleted file mode")) return "removed";
  if (joined.includes("rename from") && joined.includes("rename to")) return "renamed";
  return "modified";
}

const HEADER_PREFIXES = [
  "index ",
  "--- ",
  "+++ ",
  "new file mode",
  "deleted file mode",
  "rename from",
  "rename to",
];

interface FileDraft {
  filename: string;
  additions: number;
  deletions: number;
  patch: string[];
  headers: string[];
}

/** Parses `git diff` output into per-file entries. */
export function parseUnifiedDiff(diff: string): CommitFile[] {
  const files: CommitFile[] = [];
  let current: FileDraft | null = null;

  const flush = (): void => {
    if (!current) return;
    files.push({
      filename: current.filename,
      status: statusFromHeaders(current.headers),
      additions: current.additions,
      deletions: current.deletions,
      patch: current.patch.join("\n"),
    });
    current = null;
  };

  for (const line of diff.split("\n")) {
    if (line.startsWith("diff --git ")) {
      flush();
      const parts = line.split(" ");
      let path = parts.length >= 4 ? (parts[parts.length - 1] ?? "") : "";
      if (path.startsWith("b/")) path = path.slice(2);
      current = { filename: path, additions: 0, deletions: 0, patch: [], headers: [line] };
      continue;
    }
    if (!current) continue;

    if (HEADER_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      current.headers.push(line);
      if (line.startsWith("+++ b/")) current.filename = line.slice(6);
      continue;
    }
    if (line.startsWith("@@") || line.startsWith("+") || line.startsWith("-") || line.startsWith(" ")) {
      current.patch.push(line);
      if (line.startsWith("+")) current.additions += 1;
      else if (line.startsWith("-")) current.deletions += 1;
      continue;
    }
    current.headers.push(line);
  }
  flush();
  return mergeFilesByPath(files);
}
