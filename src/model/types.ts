export interface GenerateRequest {
  readonly model: string;
  readonly prompt: string;
  readonly system?: string;
}

/** One provider call. Resolves null (or blank) when the provider returned no text. */
export interface ModelClient {
  generate(request: GenerateRequest): Promise<string | null>;
}

export interface GenerateResult {
  readonly text: string;
  /** Model identifier that produced `text`, after any fallback. */
  readonly model: string;
}

/** Provider failure with the HTTP status and provider status code, when known. */
export class ModelRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly code?: string,
  ) {
    super(message);
    this.name = "ModelRequestError";
  }
}
