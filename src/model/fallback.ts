import type { Logger } from "../logging/logger.js";
import { ConfigurationError, ModelInvocationError, errorMessage } from "../workflows/errors.js";
import { jitteredDelay, sleep } from "../utils/retry.js";
import { ModelRequestError } from "./types.js";
import type { GenerateResult, ModelClient } from "./types.js";

export interface ModelSessionOptions {
  /** Lower-tier model → higher-tier substitute. */
  readonly fallbacks?: Readonly<Record<string, string>>;
  /** Base delay before a rate-limited retry. Zero disables the wait. */
  readonly rateLimitDelayMs?: number;
}

type FailureKind = "rate_limited" | "not_found" | "unavailable" | "other";

const LATEST_SUFFIX = "-latest";

export function classifyModelFailure(err: unknown): FailureKind {
  const status = err instanceof ModelRequestError ? err.status : undefined;
  const code = err instanceof ModelRequestError ? err.code : undefined;
  const text = `${code ?? ""} ${errorMessage(err)}`;

  if (status === 429 || text.includes("RESOURCE_EXHAUSTED")) return "rate_limited";
  if (status === 404 || text.includes("NOT_FOUND")) return "not_found";
  if (status === 503 || text.includes("UNAVAILABLE")) return "unavailable";
  return "other";
}

/**
 * Generation handle shared by every stage of one workflow invocation. A model
 * substitution made while serving one stage sticks for the stages after it,
 * so a run never mixes models.
 *
 * Per `generate()` call each recovery fires at most once: the same-model retry
 * (empty text or rate limit), the `-latest` strip on NOT_FOUND, and the
 * lower→higher tier substitution. Anything else ends in ModelInvocationError.
 */
export class ModelSession {
  private current: string;
  private readonly fallbacks: Readonly<Record<string, string>>;
  private readonly rateLimitDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: ModelClient,
    model: string,
    logger: Logger,
    opts?: ModelSessionOptions,
  ) {
    this.current = model;
    this.fallbacks = opts?.fallbacks ?? {};
    this.rateLimitDelayMs = opts?.rateLimitDelayMs ?? 1_000;
    this.logger = logger.child({ component: "model-session" });
  }

  get model(): string {
    return this.current;
  }

  async generate(prompt: string, system?: string): Promise<GenerateResult> {
    let retried = false;
    let stripped = false;
    let substituted = false;

    for (;;) {
      const model = this.current;
      let text: string | null;
      try {
        text = await this.client.generate({ model, prompt, system });
      } catch (err) {
        if (err instanceof ConfigurationError) throw err;
        const kind = classifyModelFailure(err);

        if (kind === "rate_limited" && !retried) {
          retried = true;
          this.logger.warn({ model, err }, "Model rate limited; retrying once");
          if (this.rateLimitDelayMs > 0) {
            await sleep(jitteredDelay(this.rateLimitDelayMs, 0, this.rateLimitDelayMs));
          }
          continue;
        }

        if (kind === "not_found" && !stripped && model.includes(LATEST_SUFFIX)) {
          stripped = true;
          this.switchTo(model.replace(LATEST_SUFFIX, ""), err);
          continue;
        }

        const substitute = this.fallbacks[model];
        if ((kind === "not_found" || kind === "unavailable") && !substituted && substitute) {
          substituted = true;
          this.switchTo(substitute, err);
          continue;
        }

        throw new ModelInvocationError(
          model,
          `Model invocation failed for ${model}: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      if (text !== null && text.trim() !== "") {
        return { text: text.trim(), model };
      }
      if (retried) {
        throw new ModelInvocationError(model, `Model ${model} returned an empty response`);
      }
      retried = true;
      this.logger.warn({ model }, "Empty model response; retrying once");
    }
  }

  private switchTo(model: string, cause: unknown): void {
    this.logger.warn({ from: this.current, to: model, err: cause }, "Falling back to another model");
    this.current = model;
  }
}
