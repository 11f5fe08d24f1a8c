import { retry } from "../utils/retry.js";

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpError extends Error {
  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${url} failed: ${status}${body ? ` ${body.slice(0, 300)}` : ""}`);
    this.name = "HttpError";
  }
}

export interface RequestOptions {
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: string | FormData;
  readonly timeoutMs?: number;
  /** GETs default to three attempts; writes are sent once. */
  readonly attempts?: number;
}

function isRetryable(err: unknown): boolean {
  if (err instanceof HttpError) return err.status >= 500;
  return true;
}

/** The body is read before the timer is cleared, so a stalled body still times out. */
async function send(url: string, opts: RequestOptions): Promise<string> {
  const method = opts.method ?? "GET";
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  try {
    const response = await fetch(url, {
      method,
      headers: opts.headers,
      body: opts.body,
      signal: controller.signal,
    });
    const text = await response.text();
    if (!response.ok) {
      throw new HttpError(method, url, response.status, text);
    }
    return text;
  } finally {
    clearTimeout(timeout);
  }
}

export async function requestText(url: string, opts: RequestOptions = {}): Promise<string> {
  const attempts = opts.attempts ?? ((opts.method ?? "GET") === "GET" ? 3 : 1);
  return retry(() => send(url, opts), { maxAttempts: attempts, shouldRetry: isRetryable });
}

/** Sends the request and parses the body as JSON; an empty body yields `{}`. */
export async function requestJson(url: string, opts: RequestOptions = {}): Promise<unknown> {
  const text = await requestText(url, opts);
  if (text.trim() === "") return {};
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
