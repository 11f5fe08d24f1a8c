import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";
import { errorMessage } from "../../workflows/errors.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the webhook server (and the digest schedule when configured)",
    examples: [
      ["Start with default config", "leadsync serve"],
      ["Start with custom config", "leadsync serve --config ./leadsync.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      await startGateway(this.config);
    } catch (err) {
      this.context.stderr.write(`Failed to start LeadSync: ${errorMessage(err)}\n`);
      return 1;
    }
    // The HTTP listener keeps the process alive until SIGTERM/SIGINT.
    return 0;
  }
}
