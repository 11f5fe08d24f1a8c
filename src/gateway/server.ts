import { Hono } from "hono";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { serve } from "@hono/node-server";
import type { Logger } from "../logging/logger.js";
import type { JsonObject } from "../memory/types.js";
import { asString, isRecord } from "../utils/text.js";
import type { DigestWorkflow, RunSource } from "../workflows/digest.js";
import type { DoneScanWorkflow } from "../workflows/done-scan.js";
import { WorkflowError, errorMessage } from "../workflows/errors.js";
import type { LeaderRulesWorkflow } from "../workflows/leader-rules.js";
import type { PrDescriptionWorkflow } from "../workflows/pr-description.js";
import type { PrLinkWorkflow } from "../workflows/pr-link.js";
import { parseSlackText } from "../workflows/slack-qa.js";
import type { SlackQaWorkflow, SlackQuestion } from "../workflows/slack-qa.js";
import type { TicketEnrichmentWorkflow } from "../workflows/ticket-enrichment.js";
import type { WorkflowResult } from "../workflows/types.js";
import { parseIssueContext } from "../context/issue.js";

export interface Workflows {
  readonly enrichment: TicketEnrichmentWorkflow;
  readonly doneScan: DoneScanWorkflow;
  readonly digest: DigestWorkflow;
  readonly slackQa: SlackQaWorkflow;
  readonly prDescription: PrDescriptionWorkflow;
  readonly prLink: PrLinkWorkflow;
  readonly leaderRules: LeaderRulesWorkflow;
}

export interface WebhookServerOptions {
  readonly port: number;
  readonly hostname: string;
  /** When set, `/digest/trigger` requires it in `X-LeadSync-Trigger-Token`. */
  readonly triggerToken?: string;
}

const RUN_SOURCES: readonly RunSource[] = ["manual", "scheduled"];

function isRunSource(value: string): value is RunSource {
  return RUN_SOURCES.some((source) => source === value);
}

function badRequest(detail: string): HTTPException {
  return new HTTPException(400, { message: detail });
}

function field(record: JsonObject, key: string): string {
  const value = record[key];
  if (typeof value === "number") return String(value);
  return asString(value).trim();
}

export function coerceWindowMinutes(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  const minutes = typeof value === "number" ? value : Number(asString(value).trim() || Number.NaN);
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw badRequest("window_minutes must be a positive integer.");
  }
  return minutes;
}

function respond(c: Context, outcome: WorkflowResult, extra: JsonObject = {}): Response {
  return c.json({ status: outcome.status, model: outcome.model, result: outcome.result, ...extra });
}

export class WebhookServer {
  private readonly hono: Hono;
  private readonly logger: Logger;
  private server: ReturnType<typeof serve> | null = null;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly workflows: Workflows,
    private readonly options: WebhookServerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "http" });
    this.hono = new Hono();
    this.setupRoutes();
  }

  get app(): Hono {
    return this.hono;
  }

  private setupRoutes(): void {
    this.hono.onError((err, c) => {
      if (err instanceof HTTPException) {
        return c.json({ detail: err.message }, err.status);
      }
      if (err instanceof WorkflowError) {
        this.logger.warn({ err, path: c.req.path }, "Workflow request failed");
        return c.json({ detail: err.message }, err.status === 400 ? 400 : 500);
      }
      this.logger.error({ err, path: c.req.path }, "Unhandled request failure");
      return c.json({ detail: `Workflow run failed: ${errorMessage(err)}` }, 500);
    });

    this.hono.get("/health", (c) => c.json({ status: "ok" }));

    this.hono.post("/webhooks/jira", async (c) => {
      const payload = await this.readJson(c);
      const issue = parseIssueContext(payload);
      const outcome =
        issue.statusCategory === "done"
          ? await this.workflows.doneScan.run(payload)
          : await this.workflows.enrichment.run(payload);
      return respond(c, outcome);
    });

    this.hono.post("/webhooks/github", async (c) => {
      const payload = await this.readJson(c);
      const outcome = await this.workflows.prDescription.run(payload);
      let link: JsonObject = { status: "failed" };
      try {
        const linked = await this.workflows.prLink.run(payload);
        link = { status: linked.status, ...linked.result };
      } catch (err) {
        this.logger.error({ err }, "PR auto-link failed; description result still returned");
      }
      return respond(c, outcome, { link_result: link });
    });

    this.hono.post("/digest/trigger", async (c) => {
      this.verifyTriggerToken(c);
      const payload = await this.readJson(c, { optional: true });
      const runSource = field(payload, "run_source").toLowerCase() || "manual";
      if (!isRunSource(runSource)) {
        throw badRequest("run_source must be 'manual' or 'scheduled'.");
      }
      const outcome = await this.workflows.digest.run({
        runSource,
        bucketStartUtc: field(payload, "bucket_start_utc") || null,
        windowMinutes: coerceWindowMinutes(payload["window_minutes"]),
        repoOwner: field(payload, "repo_owner") || null,
        repoName: field(payload, "repo_name") || null,
      });
      return respond(c, outcome);
    });

    this.hono.post("/slack/commands", async (c) => {
      if (isFormRequest(c)) {
        const form = await readForm(c);
        if (form["ssl_check"] === "1") return c.json({ status: "ok" });
        const text = form["text"] ?? "";
        if (!text) throw badRequest("Slack 'text' field is empty.");
        const { ticketKey, question } = parseSlackText(text);
        if (!ticketKey) throw badRequest("ticket_key is required.");
        this.runInBackground(`slack_qa ${ticketKey}`, () =>
          this.workflows.slackQa.run({
            ticketKey,
            question,
            threadTs: form["thread_ts"] || null,
            channelId: form["channel_id"] || null,
          }),
        );
        return c.json({
          response_type: "ephemeral",
          text: `LeadSync is processing ${ticketKey} and will reply shortly.`,
        });
      }

      const payload = await this.readJson(c);
      const question = slackQuestionFromJson(payload);
      if (!question.ticketKey) throw badRequest("ticket_key is required.");
      return respond(c, await this.workflows.slackQa.run(question));
    });

    this.hono.post("/slack/prefs", async (c) => {
      const form = await readForm(c);
      if (form["ssl_check"] === "1") return c.json({ status: "ok" });
      const text = form["text"] ?? "";
      if (!text) throw badRequest("Rule text is required.");
      const stored = this.workflows.leaderRules.add(text, form["user_name"] || form["user_id"] || null);
      return c.json({
        response_type: "ephemeral",
        text: `Leader rule saved: ${asString(stored.result["rule"]) || text}`,
      });
    });
  }

  private verifyTriggerToken(c: Context): void {
    const expected = this.options.triggerToken?.trim();
    if (!expected) return;
    const provided = (c.req.header("X-LeadSync-Trigger-Token") ?? "").trim();
    if (provided !== expected) {
      throw new HTTPException(401, { message: "Unauthorized digest trigger." });
    }
  }

  private async readJson(c: Context, opts: { optional?: boolean } = {}): Promise<JsonObject> {
    const body = await c.req.text();
    if (!body.trim()) {
      if (opts.optional) return {};
      throw badRequest("JSON body is required.");
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw badRequest("Invalid JSON body.");
    }
    if (!isRecord(parsed)) throw badRequest("JSON body must be an object.");
    return parsed;
  }

  private runInBackground(label: string, task: () => Promise<unknown>): void {
    const tracked: Promise<void> = task()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error({ err, task: label }, "Background workflow failed");
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  /** Resolves once every background workflow started so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.hono.fetch,
      port: this.options.port,
      hostname: this.options.hostname,
    });
    this.logger.info({ port: this.options.port, hostname: this.options.hostname }, "HTTP server listening");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
    await this.drain();
  }
}

function isFormRequest(c: Context): boolean {
  return (c.req.header("content-type") ?? "").includes("application/x-www-form-urlencoded");
}

async function readForm(c: Context): Promise<Record<string, string>> {
  const raw = await c.req.text();
  const form: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(raw)) {
    form[key] = value.trim();
  }
  return form;
}

function slackQuestionFromJson(payload: JsonObject): SlackQuestion {
  let ticketKey = field(payload, "ticket_key");
  let question = asString(payload["question"]);
  const text = field(payload, "text");
  if (!ticketKey && text) {
    ({ ticketKey, question } = parseSlackText(text));
  }
  return {
    ticketKey,
    question,
    threadTs: field(payload, "thread_ts") || field(payload, "message_ts") || null,
    channelId: field(payload, "channel_id") || null,
  };
}
