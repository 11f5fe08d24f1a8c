import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir, resolveMemoryDbPath, resolveTemplatesDir } from "../config/paths.js";
import type { LeadSyncConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MemoryDB } from "../memory/db.js";
import { MemoryRecorder } from "../memory/recorder.js";
import { MemoryQuery } from "../memory/query.js";
import { JiraRestClient } from "../integrations/jira.js";
import { GitHubRestClient } from "../integrations/github.js";
import { SlackChatClient } from "../integrations/slack.js";
import { GoogleDocsClient } from "../integrations/gdocs.js";
import {
  UnconfiguredChat,
  UnconfiguredCodeHost,
  UnconfiguredDocs,
  UnconfiguredModel,
  UnconfiguredTracker,
} from "../integrations/unconfigured.js";
import type { ChatClient, CodeHostClient, DocumentClient, TrackerClient } from "../integrations/types.js";
import { GeminiModelClient } from "../model/gemini.js";
import type { ModelClient } from "../model/types.js";
import { TicketEnrichmentWorkflow } from "../workflows/ticket-enrichment.js";
import { DoneScanWorkflow } from "../workflows/done-scan.js";
import { DigestWorkflow } from "../workflows/digest.js";
import { SlackQaWorkflow } from "../workflows/slack-qa.js";
import { PrDescriptionWorkflow } from "../workflows/pr-description.js";
import { PrLinkWorkflow } from "../workflows/pr-link.js";
import { LeaderRulesWorkflow } from "../workflows/leader-rules.js";
import type { WorkflowDeps } from "../workflows/types.js";
import { DigestSchedule } from "../cron/digest-schedule.js";
import { WebhookServer, type Workflows } from "./server.js";

export interface Collaborators {
  readonly tracker: TrackerClient;
  readonly codeHost: CodeHostClient;
  readonly chat: ChatClient;
  readonly docs: DocumentClient;
  readonly model: ModelClient;
}

export interface Runtime {
  readonly config: LeadSyncConfig;
  readonly logger: Logger;
  readonly memoryDb: MemoryDB;
  readonly deps: WorkflowDeps;
  readonly workflows: Workflows;
}

export interface GatewayContext extends Runtime {
  readonly server: WebhookServer;
  readonly schedule: DigestSchedule | null;
  shutdown(): Promise<void>;
}

/** Real REST clients where credentials are present, stand-ins that fail with a 400 otherwise. */
export function createCollaborators(config: LeadSyncConfig, logger: Logger): Collaborators {
  const { jira, github, slack, docs, model } = config;
  const timeoutMs = model.timeoutMs;

  const tracker =
    jira.baseUrl && jira.email && jira.apiToken
      ? new JiraRestClient({ baseUrl: jira.baseUrl, email: jira.email, apiToken: jira.apiToken })
      : new UnconfiguredTracker();
  const codeHost = github.token
    ? new GitHubRestClient({ token: github.token, apiUrl: github.apiUrl })
    : new UnconfiguredCodeHost();
  const chat =
    slack.botToken && slack.signingSecret
      ? new SlackChatClient({ botToken: slack.botToken, signingSecret: slack.signingSecret })
      : new UnconfiguredChat();
  const documents = docs.accessToken ? new GoogleDocsClient(docs.accessToken) : new UnconfiguredDocs();
  const modelClient = model.apiKey
    ? new GeminiModelClient({ apiKey: model.apiKey, baseUrl: model.baseUrl, timeoutMs })
    : new UnconfiguredModel();

  const missing = [
    tracker instanceof UnconfiguredTracker ? "jira" : null,
    codeHost instanceof UnconfiguredCodeHost ? "github" : null,
    chat instanceof UnconfiguredChat ? "slack" : null,
    documents instanceof UnconfiguredDocs ? "docs" : null,
    modelClient instanceof UnconfiguredModel ? "model" : null,
  ].filter((name): name is string => name !== null);
  if (missing.length > 0) {
    logger.warn({ missing }, "Some integrations have no credentials; workflows using them will fail");
  }

  return { tracker, codeHost, chat, docs: documents, model: modelClient };
}

export function createWorkflows(deps: WorkflowDeps): Workflows {
  return {
    enrichment: new TicketEnrichmentWorkflow(deps),
    doneScan: new DoneScanWorkflow(deps),
    digest: new DigestWorkflow(deps),
    slackQa: new SlackQaWorkflow(deps),
    prDescription: new PrDescriptionWorkflow(deps),
    prLink: new PrLinkWorkflow(deps),
    leaderRules: new LeaderRulesWorkflow(deps),
  };
}

/** Config, logger, store and workflows, without the HTTP server. The CLI uses this directly. */
export function createRuntime(configPath?: string, overrides?: { logger?: Logger }): Runtime {
  const config = loadConfig(configPath);
  const logger = overrides?.logger ?? createLogger(config.logging);
  const stateDir = ensureDir(getStateDir());

  const memoryDb = new MemoryDB(resolveMemoryDbPath(config, stateDir));
  try {
    memoryDb.initialize();
  } catch (err) {
    logger.error({ err, path: memoryDb.location }, "Failed to initialize memory store");
  }

  const deps: WorkflowDeps = {
    config,
    logger,
    ...createCollaborators(config, logger),
    recorder: new MemoryRecorder(memoryDb, logger),
    query: new MemoryQuery(memoryDb, logger),
    templatesDir: resolveTemplatesDir(config),
  };

  return { config, logger, memoryDb, deps, workflows: createWorkflows(deps) };
}

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  const runtime = createRuntime(configPath);
  const { config, logger, memoryDb, workflows } = runtime;
  logger.info("Starting LeadSync...");

  const server = new WebhookServer(
    workflows,
    { port: config.server.port, hostname: config.server.hostname, triggerToken: config.server.triggerToken },
    logger,
  );
  await server.start();

  let schedule: DigestSchedule | null = null;
  if (config.digest.schedule) {
    schedule = new DigestSchedule(
      workflows.digest,
      {
        schedule: config.digest.schedule,
        timezone: config.digest.timezone,
        windowMinutes: config.digest.windowMinutes,
      },
      logger,
    );
    schedule.start();
  }

  const SHUTDOWN_TIMEOUT_MS = 15_000;
  let shutdownInProgress = false;

  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    schedule?.stop();
    // Lets background Slack answers finish before the store closes.
    await server.stop();
    memoryDb.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ port: config.server.port }, "LeadSync started");
  return { ...runtime, server, schedule, shutdown };
}
