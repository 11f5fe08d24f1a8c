import { HttpError, requestJson } from "../integrations/http.js";
import { ModelRequestError } from "./types.js";
import type { GenerateRequest, ModelClient } from "./types.js";
import { asArray, asRecord, asString } from "../utils/text.js";

export interface GeminiConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

/** Provider status code (`NOT_FOUND`, `UNAVAILABLE`, ...) from a Gemini error body. */
export function providerStatus(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    const status = asString(asRecord(asRecord(parsed)["error"])["status"]);
    return status || undefined;
  } catch {
    return undefined;
  }
}

/** Gemini `generateContent`. Accepts "gemini/<name>" model ids as well as bare names. */
export class GeminiModelClient implements ModelClient {
  constructor(private readonly config: GeminiConfig) {}

  async generate(request: GenerateRequest): Promise<string | null> {
    const model = request.model.replace(/^gemini\//, "");
    const url = `${this.config.baseUrl.replace(/\/$/, "")}/models/${encodeURIComponent(model)}:generateContent`;
    const body = {
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
      ...(request.system ? { systemInstruction: { parts: [{ text: request.system }] } } : {}),
    };

    let data: unknown;
    try {
      data = await requestJson(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-goog-api-key": this.config.apiKey },
        body: JSON.stringify(body),
        timeoutMs: this.config.timeoutMs,
      });
    } catch (err) {
      if (err instanceof HttpError) {
        throw new ModelRequestError(err.message, err.status, providerStatus(err.body));
      }
      throw new ModelRequestError(err instanceof Error ? err.message : String(err));
    }

    const candidate = asRecord(asArray(asRecord(data)["candidates"])[0]);
    const text = asArray(asRecord(candidate["content"])["parts"])
      .map((part) => asString(asRecord(part)["text"]))
      .join("");
    return text.trim() ? text : null;
  }
}
