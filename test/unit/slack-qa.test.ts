import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import { splitSentences } from "../../src/utils/text.js";
import { ConfigurationError, WriteConfirmationError } from "../../src/workflows/errors.js";
import { SlackQaWorkflow, answerPrompt, parseSlackText } from "../../src/workflows/slack-qa.js";
import { ScriptedModel, createHarness, jiraIssue, makeTempDir } from "../helpers/fakes.js";
import type { TestHarness } from "../helpers/fakes.js";

const TEMPLATES_DIR = fileURLToPath(new URL("../../templates", import.meta.url));
const DATABASE_PREFERENCES = "Extend existing tables with nullable columns instead of creating parallel tables.";

describe("parseSlackText", () => {
  it("splits the ticket key from the question", () => {
    expect(parseSlackText("  LEADS-2   Who owns this? ")).toEqual({ ticketKey: "LEADS-2", question: "Who owns this?" });
    expect(parseSlackText("LEADS-2")).toEqual({ ticketKey: "LEADS-2", question: "" });
  });
});

describe("answerPrompt", () => {
  const base = { question: "q", retrieved: "r", category: "database", preferences: DATABASE_PREFERENCES };

  it("only includes preferences for implementation questions", () => {
    expect(answerPrompt({ ...base, type: "GENERAL" })).not.toContain(DATABASE_PREFERENCES);
    expect(answerPrompt({ ...base, type: "PROGRESS" })).not.toContain(DATABASE_PREFERENCES);
    expect(answerPrompt({ ...base, type: "IMPLEMENTATION" })).toContain(DATABASE_PREFERENCES);
  });
});

describe("SlackQaWorkflow", () => {
  let dir: string;
  let cleanup: () => void;
  let harness: TestHarness;

  function setup(model: ScriptedModel): SlackQaWorkflow {
    harness = createHarness({ model, templatesDir: TEMPLATES_DIR, artifactsDir: dir });
    harness.tracker.issues.set(
      "LEADS-2",
      jiraIssue({ key: "LEADS-2", summary: "Add users table paging", labels: ["database"], assignee: "Dana" }),
    );
    return new SlackQaWorkflow(harness.deps);
  }

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir("leadsync-qa-"));
  });

  afterEach(() => {
    harness.db.close();
    cleanup();
  });

  it("answers factual questions without preference text", async () => {
    const model = new ScriptedModel(
      "QUESTION_TYPE: GENERAL\nLEADS-2 is assigned to Dana.",
      "Dana is assigned to LEADS-2. It is still in To Do. Nothing else is known.",
    );
    const workflow = setup(model);

    const outcome = await workflow.run({ ticketKey: "LEADS-2", question: "Who is assigned to this ticket?" });

    expect(outcome.result["question_type"]).toBe("GENERAL");
    expect(outcome.result["answer"]).toBe("Dana is assigned to LEADS-2. It is still in To Do.");
    for (const request of model.requests) {
      expect(request.prompt).not.toContain(DATABASE_PREFERENCES);
    }
    expect(harness.chat.posts).toEqual([
      {
        channel: "C-TEST",
        text: "[LEADS-2] LeadSync summary:\nDana is assigned to LEADS-2. It is still in To Do.",
        threadTs: undefined,
      },
    ]);
  });

  it("gives an opinionated answer grounded in the category preferences", async () => {
    const model = new ScriptedModel(
      "QUESTION_TYPE: IMPLEMENTATION\nThe ticket adds paging to users.",
      [
        "Extend the existing users table with a nullable column. Do not create a parallel table.",
        "Backfill in batches. Add an index if reads need it. Revisit later.",
        "- Pro: fewer joins",
        "- Con: wider rows",
      ].join("\n"),
    );
    const workflow = setup(model);

    const outcome = await workflow.run({
      ticketKey: "LEADS-2",
      question: "Should I extend the users table?",
      threadTs: "1700000000.000200",
      channelId: "C-THREAD",
    });

    const answer = String(outcome.result["answer"]);
    const [prose, ...bullets] = answer.split("\n");
    const sentences = splitSentences(prose ?? "");
    expect(sentences.length).toBeGreaterThanOrEqual(2);
    expect(sentences.length).toBeLessThanOrEqual(4);
    expect(prose).toContain("nullable column");
    expect(bullets).toEqual(["- Pro: fewer joins", "- Con: wider rows"]);

    const prompt = model.requests[1]?.prompt ?? "";
    expect(prompt).toContain("Category: database");
    expect(prompt).toContain(DATABASE_PREFERENCES);
    expect(harness.chat.posts[0]).toMatchObject({ channel: "C-THREAD", threadTs: "1700000000.000200" });

    const memory = harness.query.ticketMemory("LEADS-2");
    expect(memory).toHaveLength(1);
    expect(memory[0]).toMatchObject({ itemType: "slack_qa", decision: answer, rulesApplied: "preferences-database" });
  });

  it("answers with defaults when the ticket cannot be fetched", async () => {
    const model = new ScriptedModel("QUESTION_TYPE: GENERAL\nUnknown.", "No details are available for LEADS-9.");
    const workflow = setup(model);

    const outcome = await workflow.run({ ticketKey: "LEADS-9", question: "What is this about?" });

    expect(outcome.result["answer"]).toBe("No details are available for LEADS-9.");
  });

  it("requires a question", async () => {
    const workflow = setup(new ScriptedModel("x"));
    await expect(workflow.run({ ticketKey: "LEADS-2", question: "  " })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("does not record anything when Slack rejects the reply", async () => {
    const workflow = setup(new ScriptedModel("QUESTION_TYPE: GENERAL\nx", "Dana owns it."));
    harness.chat.response = { ok: false, error: "channel_not_found" };

    await expect(workflow.run({ ticketKey: "LEADS-2", question: "Who?" })).rejects.toBeInstanceOf(
      WriteConfirmationError,
    );
    expect(harness.query.recentEvents()).toHaveLength(0);
  });
});
