import { WriteConfirmationError } from "../workflows/errors.js";
import { excerpt, extractText, isRecord } from "../utils/text.js";

const FAILURE_STATUS = new Set(["error", "failed", "failure"]);
const FAILURE_TOKENS = ["error", "failed", "forbidden", "unauthorized", "not found", "exception"];

function hasValue(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === "") return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

/** True when a write response looks like a failure even though no exception was raised. */
export function responseIndicatesFailure(response: unknown): boolean {
  if (response === null || response === undefined) return true;

  if (isRecord(response)) {
    if (response["successful"] === false || response["success"] === false || response["ok"] === false) {
      return true;
    }
    const status = response["status"];
    if (typeof status === "string" && FAILURE_STATUS.has(status.trim().toLowerCase())) return true;
    return hasValue(response["error"]) || hasValue(response["errors"]) || hasValue(response["errorMessages"]);
  }

  if (typeof response === "string") {
    const text = response.trim().toLowerCase();
    if (!text || text.includes("no error")) return false;
    return FAILURE_TOKENS.some((token) => text.includes(token));
  }
  return false;
}

export function summarizeResponse(response: unknown, maxChars = 280): string {
  const text = extractText(response) || JSON.stringify(response) || String(response);
  return excerpt(text, maxChars);
}

/** Throws WriteConfirmationError when `response` carries a failure indicator; otherwise returns it. */
export function confirmWrite<T>(action: string, response: T): T {
  if (responseIndicatesFailure(response)) {
    throw new WriteConfirmationError(action, summarizeResponse(response));
  }
  return response;
}
