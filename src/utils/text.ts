export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function asNumber(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

const TEXT_KEYS = ["plain_text", "plaintext", "content", "result", "data", "response"] as const;

/**
 * Flattens strings, arrays and objects (Atlassian document trees, API
 * envelopes) into plain text. A `text` string wins over every other key.
 */
export function extractText(value: unknown, joiner = " "): string {
  if (typeof value === "string") return value.trim();
  if (Array.isArray(value)) {
    return value
      .map((item) => extractText(item, joiner))
      .filter((part) => part.length > 0)
      .join(joiner);
  }
  if (!isRecord(value)) return "";

  const text = value["text"];
  if (typeof text === "string") return text.trim();

  for (const key of TEXT_KEYS) {
    if (key in value) {
      const candidate = extractText(value[key], joiner);
      if (candidate) return candidate;
    }
  }
  return Object.values(value)
    .map((item) => extractText(item, joiner))
    .filter((part) => part.length > 0)
    .join(joiner);
}

/** Lowercases each value and adds its alphanumeric pieces ("Front-End" → front-end, front, end). */
export function normalizeTokens(values: readonly string[]): string[] {
  const tokens: string[] = [];
  for (const value of values) {
    const lowered = value.trim().toLowerCase();
    if (!lowered) continue;
    tokens.push(lowered);
    tokens.push(...lowered.split(/[^a-z0-9]+/).filter((token) => token.length > 0));
  }
  return tokens;
}

export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

export function excerpt(text: string, maxChars: number): string {
  const plain = normalizeWhitespace(text);
  if (plain.length <= maxChars) return plain;
  return `${plain.slice(0, maxChars - 3).trimEnd()}...`;
}

/** Compacts multiline text into at most `limit` plain lines, dropping bullets and backticks. */
export function cleanLines(text: string, limit: number): string[] {
  const lines: string[] = [];
  for (const raw of text.split("\n")) {
    let line = raw.trim();
    if (!line) continue;
    if (line.startsWith("- ") || line.startsWith("* ")) line = line.slice(2).trim();
    line = normalizeWhitespace(line.replace(/`/g, ""));
    if (!line) continue;
    lines.push(line);
    if (lines.length >= limit) break;
  }
  return lines;
}

export function splitSentences(text: string): string[] {
  return normalizeWhitespace(text)
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence.length > 0);
}
