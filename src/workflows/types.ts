import type { LeadSyncConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ChatClient, CodeHostClient, DocumentClient, RepoRef, TrackerClient } from "../integrations/types.js";
import type { ModelClient } from "../model/types.js";
import { ModelSession } from "../model/fallback.js";
import type { MemoryQuery } from "../memory/query.js";
import type { MemoryRecorder } from "../memory/recorder.js";
import type { JsonObject } from "../memory/types.js";
import { ConfigurationError } from "./errors.js";

export type WorkflowStatus = "processed" | "skipped" | "unchanged";

export interface WorkflowResult<T extends JsonObject = JsonObject> {
  readonly status: WorkflowStatus;
  /** Model actually used, or null when the run made no model call. */
  readonly model: string | null;
  readonly result: T;
}

/** Everything a workflow needs, injected once at start-up (tests swap in fakes). */
export interface WorkflowDeps {
  readonly config: LeadSyncConfig;
  readonly logger: Logger;
  readonly tracker: TrackerClient;
  readonly codeHost: CodeHostClient;
  readonly chat: ChatClient;
  readonly docs: DocumentClient;
  readonly model: ModelClient;
  readonly recorder: MemoryRecorder;
  readonly query: MemoryQuery;
  readonly templatesDir: string;
  readonly now?: () => Date;
  /** Wait before a rate-limited model retry. */
  readonly rateLimitDelayMs?: number;
}

export function openSession(deps: WorkflowDeps, logger: Logger): ModelSession {
  return new ModelSession(deps.model, deps.config.model.name, logger, {
    fallbacks: deps.config.model.fallbacks,
    rateLimitDelayMs: deps.rateLimitDelayMs,
  });
}

/** Repository the workflow acts on: explicit override first, then config. */
export function requireRepo(
  deps: WorkflowDeps,
  override?: { owner?: string | null; repo?: string | null },
): RepoRef {
  const owner = override?.owner || deps.config.github.repoOwner;
  const repo = override?.repo || deps.config.github.repoName;
  if (!owner || !repo) {
    throw new ConfigurationError(
      "Missing GitHub repository target. Set github.repoOwner and github.repoName.",
    );
  }
  return { owner, repo };
}

export function currentTime(deps: WorkflowDeps): Date {
  return deps.now ? deps.now() : new Date();
}
