import type { Logger } from "../logging/logger.js";
import { confirmWrite } from "../integrations/response.js";
import { parseIssueContext } from "../context/issue.js";
import type { IssueContext } from "../context/issue.js";
import { appendLeaderRules, loadPreferences, resolvePreferenceCategory } from "../context/preferences.js";
import { buildSameLabelHistory } from "../context/jira-history.js";
import { formatSlackMemoryContext } from "../memory/query.js";
import { CLASSIFICATION_RULES, parseQuestionType, shapeAnswer } from "../classifier/question.js";
import type { QuestionType } from "../classifier/question.js";
import type { ModelSession } from "../model/fallback.js";
import { ConfigurationError } from "./errors.js";
import { openSession } from "./types.js";
import type { WorkflowDeps, WorkflowResult } from "./types.js";

export interface SlackQuestion {
  readonly ticketKey: string;
  readonly question: string;
  readonly threadTs?: string | null;
  readonly channelId?: string | null;
}

export interface AnswerInput {
  readonly type: QuestionType;
  readonly question: string;
  readonly retrieved: string;
  readonly category: string;
  /** Always loaded; only the IMPLEMENTATION branch puts it in the prompt. */
  readonly preferences: string;
}

/** Splits slash-command text such as `LEADS-12 How should I page this?`. */
export function parseSlackText(text: string): { ticketKey: string; question: string } {
  const trimmed = text.trim();
  const space = trimmed.indexOf(" ");
  if (space === -1) return { ticketKey: trimmed, question: "" };
  return { ticketKey: trimmed.slice(0, space), question: trimmed.slice(space + 1).trim() };
}

export function answerPrompt(input: AnswerInput): string {
  const header = [`Question: ${input.question}`, "Ticket context:", input.retrieved, ""];
  switch (input.type) {
    case "GENERAL":
      return [
        ...header,
        "Return only factual information from the ticket in 1-2 sentences.",
        "Do not give implementation opinions.",
      ].join("\n");
    case "PROGRESS":
      return [
        ...header,
        "Start with this exact line: 'Here is summary of previous progress related to tasks with the same label:'.",
        "Provide 3-6 bullets with completed ticket keys and what was completed earlier.",
        "End with one short line: 'What this means now: ...'.",
      ].join("\n");
    case "IMPLEMENTATION":
      return [
        ...header,
        "Apply the following tech lead guidance to give an opinionated recommendation:",
        `Category: ${input.category}`,
        "---",
        input.preferences,
        "---",
        "Return a direct recommendation in 2-4 sentences, then one bullet list of key tradeoffs.",
      ].join("\n");
  }
}

/** Slack Q&A: answers a developer question about a ticket in the thread it was asked in. */
export class SlackQaWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ workflow: "slack_qa" });
  }

  private async loadIssue(ticketKey: string): Promise<IssueContext> {
    try {
      return parseIssueContext(await this.deps.tracker.getIssue(ticketKey));
    } catch (err) {
      this.logger.warn({ err, ticketKey }, "Ticket lookup failed; answering without ticket fields");
      return parseIssueContext({ key: ticketKey });
    }
  }

  async answer(session: ModelSession, input: AnswerInput): Promise<string> {
    const generated = await session.generate(answerPrompt(input));
    return shapeAnswer(input.type, generated.text);
  }

  async run(input: SlackQuestion): Promise<WorkflowResult> {
    const { config, query, recorder } = this.deps;
    const ticketKey = input.ticketKey.trim();
    const question = input.question.trim();
    if (!ticketKey || !question) {
      throw new ConfigurationError("Both a ticket key and a question are required");
    }
    const channel = input.channelId || config.slack.channelId;
    if (!channel) throw new ConfigurationError("No Slack channel given and slack.channelId is not set");

    const issue = await this.loadIssue(ticketKey);
    const category = resolvePreferenceCategory(
      issue.primaryLabel ? [issue.primaryLabel] : [],
      issue.primaryComponent ? [issue.primaryComponent] : [],
    );
    const preferences = appendLeaderRules(
      await loadPreferences(this.deps.docs, config.docs.preferenceDocs, category),
      [...query.leaderRules(category), ...query.leaderRules("general")],
    );
    const history = await buildSameLabelHistory(
      this.deps.tracker,
      { projectKey: issue.projectKey, label: issue.primaryLabel, excludeKey: ticketKey },
      this.logger,
    );
    const memory = formatSlackMemoryContext(
      query.slackMemoryContext({
        ticketKey,
        label: issue.primaryLabel || null,
        component: issue.primaryComponent || null,
        projectKey: issue.projectKey || null,
      }),
    );

    const session = openSession(this.deps, this.logger);
    const retrieved = await session.generate(
      [
        `Ticket ${ticketKey}`,
        `Summary: ${issue.summary || "N/A"}`,
        `Description: ${issue.description || "No description provided."}`,
        `Labels: ${issue.labels.join(", ") || "none"}`,
        `Assignee: ${issue.assignee}`,
        `Status category: ${issue.statusCategory || "unknown"}`,
        `Developer question: ${question}`,
        CLASSIFICATION_RULES,
        "Then restate the ticket facts relevant to the question.",
        `Same-label prior progress context:\n${history}`,
        `Stored workflow memory context:\n${memory}`,
      ].join("\n"),
    );
    const type = parseQuestionType(retrieved.text);
    const answer = await this.answer(session, {
      type,
      question,
      retrieved: retrieved.text,
      category,
      preferences,
    });

    const threadTs = input.threadTs || undefined;
    confirmWrite(
      "Slack reply",
      await this.deps.chat.postMessage({
        channel,
        text: `[${ticketKey}] LeadSync summary:\n${answer}`,
        threadTs,
      }),
    );

    const model = session.model;
    recorder.recordEvent({
      eventType: "slack_question_answered",
      workflow: "slack_qa",
      ticketKey,
      projectKey: issue.projectKey || null,
      label: issue.primaryLabel || null,
      component: issue.primaryComponent || null,
      payload: { question, answer, question_type: type, thread_ts: threadTs ?? null, channel_id: channel, model },
    });
    recorder.recordMemoryItem({
      itemType: "slack_qa",
      workflow: "slack_qa",
      ticketKey,
      projectKey: issue.projectKey || null,
      label: issue.primaryLabel || null,
      component: issue.primaryComponent || null,
      summary: question,
      decision: answer,
      rulesApplied: type === "IMPLEMENTATION" ? `preferences-${category}` : type.toLowerCase(),
      context: { question_type: type, thread_ts: threadTs ?? null, channel_id: channel },
    });

    this.logger.info({ ticketKey, type, model }, "Slack question answered");
    return {
      status: "processed",
      model,
      result: { ticket_key: ticketKey, question_type: type, answer, channel, thread_ts: threadTs ?? null },
    };
  }
}
