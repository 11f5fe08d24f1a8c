import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { substituteEnv } from "../../config/loader.js";
import { errorMessage } from "../../workflows/errors.js";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function describeInvalid(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`).join("\n");
  }
  return `  ${errorMessage(err)}`;
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "leadsync config validate"],
      ["Validate specific file", "leadsync config validate ./leadsync.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n${describeInvalid(err)}\n`);
      return 1;
    }
  }
}
