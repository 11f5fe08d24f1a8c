import { splitSentences } from "../utils/text.js";

export const QUESTION_TYPES = ["IMPLEMENTATION", "GENERAL", "PROGRESS"] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

const MARKER = /^QUESTION_TYPE:\s*([A-Z]+)\s*$/;

function isQuestionType(value: string): value is QuestionType {
  return QUESTION_TYPES.some((type) => type === value);
}

/**
 * Reads the label from the first non-blank line of the retrieval output,
 * which must be exactly `QUESTION_TYPE: <LABEL>`. Anything else is GENERAL.
 */
export function parseQuestionType(output: string): QuestionType {
  const first = output.split("\n").find((line) => line.trim() !== "");
  const label = first ? MARKER.exec(first.trim())?.[1] : undefined;
  return label && isQuestionType(label) ? label : "GENERAL";
}

export const CLASSIFICATION_RULES = [
  "Classify the developer question:",
  "  PROGRESS: asks what was already completed for this label/category, phase progress,",
  "  or what similar prior tickets delivered.",
  "  IMPLEMENTATION: asks HOW to do something, WHICH approach to take, SHOULD I use X or Y.",
  "  GENERAL: asks WHAT the ticket is about, WHO is assigned, due/status/description details.",
  "Output the classification as the FIRST line exactly as QUESTION_TYPE: PROGRESS,",
  "QUESTION_TYPE: IMPLEMENTATION, or QUESTION_TYPE: GENERAL.",
].join("\n");

function isBullet(line: string): boolean {
  return /^\s*[-*•]\s+/.test(line);
}

/**
 * Enforces the answer shape per branch: GENERAL keeps one or two plain
 * sentences, IMPLEMENTATION keeps up to four sentences of prose plus up to
 * three tradeoff bullets. PROGRESS answers pass through trimmed.
 */
export function shapeAnswer(type: QuestionType, text: string): string {
  const trimmed = text.trim();
  if (type === "PROGRESS") return trimmed;

  const lines = trimmed.split("\n");
  const prose = lines.filter((line) => line.trim() !== "" && !isBullet(line)).join(" ");

  if (type === "GENERAL") {
    return splitSentences(prose).slice(0, 2).join(" ");
  }

  const sentences = splitSentences(prose).slice(0, 4).join(" ");
  const bullets = lines
    .filter(isBullet)
    .slice(0, 3)
    .map((line) => `- ${line.replace(/^\s*[-*•]\s+/, "").trim()}`);
  return bullets.length > 0 ? `${sentences}\n${bullets.join("\n")}` : sentences;
}
