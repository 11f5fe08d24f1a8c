import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir, resolveMemoryDbPath } from "../../config/paths.js";
import { createLogger } from "../../logging/logger.js";
import { MemoryDB } from "../../memory/db.js";
import { MemoryQuery } from "../../memory/query.js";
import { MemoryRecorder } from "../../memory/recorder.js";
import { isWorkflowName } from "../../memory/types.js";
import { LeaderRulesWorkflow } from "../../workflows/leader-rules.js";
import { errorMessage } from "../../workflows/errors.js";

interface MemoryHandle {
  readonly db: MemoryDB;
  readonly query: MemoryQuery;
  readonly rules: LeaderRulesWorkflow;
}

function openMemory(configPath?: string): MemoryHandle {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  const db = new MemoryDB(resolveMemoryDbPath(config, ensureDir(getStateDir())));
  const query = new MemoryQuery(db, logger);
  const recorder = new MemoryRecorder(db, logger);
  return { db, query, rules: new LeaderRulesWorkflow({ logger, recorder, query }) };
}

const isLimit = t.cascade(t.isNumber(), [t.isInteger(), t.isInInclusiveRange(1, 500)]);

export class MemoryEventsCommand extends Command {
  static override paths = [["memory", "events"]];

  static override usage = Command.Usage({
    description: "List recent workflow events from the memory store",
    examples: [
      ["Latest events", "leadsync memory events"],
      ["Digest runs only", "leadsync memory events --workflow daily_digest --limit 5"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  workflow = Option.String("--workflow", { description: "Filter by workflow", required: false });
  ticket = Option.String("--ticket", { description: "Filter by ticket key", required: false });
  limit = Option.String("--limit", { description: "Maximum rows (default 20)", required: false, validator: isLimit });

  async execute(): Promise<number> {
    const workflow = this.workflow;
    if (workflow !== undefined && !isWorkflowName(workflow)) {
      this.context.stdout.write(`Unknown workflow: ${workflow}\n`);
      return 1;
    }

    const memory = openMemory(this.config);
    try {
      const events = memory.query.recentEvents({
        workflow,
        ticketKey: this.ticket,
        limit: this.limit ?? 20,
      });
      if (events.length === 0) {
        this.context.stdout.write("No events recorded.\n");
        return 0;
      }
      this.context.stdout.write(`Events (${events.length}):\n`);
      for (const event of events) {
        const ticket = event.ticketKey ? ` ${event.ticketKey}` : "";
        this.context.stdout.write(`  ${event.createdAt}  ${event.workflow}/${event.eventType}${ticket}\n`);
      }
      return 0;
    } finally {
      memory.db.close();
    }
  }
}

export class MemoryRulesListCommand extends Command {
  static override paths = [["memory", "rules", "list"]];

  static override usage = Command.Usage({
    description: "List stored tech-lead rules",
    examples: [
      ["All rules", "leadsync memory rules list"],
      ["Database rules", "leadsync memory rules list --category database"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  category = Option.String("--category", { description: "Only this category", required: false });

  async execute(): Promise<number> {
    const memory = openMemory(this.config);
    try {
      const rules = memory.rules.list(this.category);
      if (rules.length === 0) {
        this.context.stdout.write("No leader rules stored.\n");
        return 0;
      }
      this.context.stdout.write(`Leader rules (${rules.length}):\n`);
      for (const rule of rules) {
        this.context.stdout.write(`  [${rule.label ?? "general"}] ${rule.summary}\n`);
      }
      return 0;
    } finally {
      memory.db.close();
    }
  }
}

export class MemoryRulesAddCommand extends Command {
  static override paths = [["memory", "rules", "add"]];

  static override usage = Command.Usage({
    description: "Store a tech-lead rule (prefix with `frontend:`, `backend:` or `database:` to scope it)",
    examples: [["Scoped rule", 'leadsync memory rules add "database: never drop columns in place"']],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  text = Option.Rest({ required: 1 });

  async execute(): Promise<number> {
    const memory = openMemory(this.config);
    try {
      const stored = memory.rules.add(this.text.join(" "), "cli");
      this.context.stdout.write(`Leader rule saved (${String(stored.result["category"])}): ${String(stored.result["rule"])}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to save rule: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      memory.db.close();
    }
  }
}
