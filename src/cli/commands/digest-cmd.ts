import { Command, Option } from "clipanion";
import * as t from "typanion";
import { createRuntime, type Runtime } from "../../gateway/lifecycle.js";
import { errorMessage } from "../../workflows/errors.js";

export class DigestRunCommand extends Command {
  static override paths = [["digest", "run"]];

  static override usage = Command.Usage({
    description: "Post a commit digest to Slack once",
    details: `
      Runs the digest workflow outside the server. With \`--bucket\`, it runs
      as the scheduled digest for the current hour and takes that hour's lock,
      so a scheduled run for the same hour and window does not post again.
    `,
    examples: [
      ["Hourly digest", "leadsync digest run"],
      ["Daily digest for another repo", "leadsync digest run --window 1440 --owner acme --repo api"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  window = Option.String("--window", {
    description: "Look-back window in minutes",
    required: false,
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isPositive()]),
  });

  owner = Option.String("--owner", { description: "Repository owner override", required: false });
  repo = Option.String("--repo", { description: "Repository name override", required: false });

  bucket = Option.Boolean("--bucket", false, { description: "Run as the scheduled digest for the current hour" });

  async execute(): Promise<number> {
    let runtime: Runtime;
    try {
      runtime = createRuntime(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    try {
      const outcome = await runtime.workflows.digest.run({
        runSource: this.bucket ? "scheduled" : "manual",
        windowMinutes: this.window,
        repoOwner: this.owner ?? null,
        repoName: this.repo ?? null,
      });
      this.context.stdout.write(JSON.stringify(outcome, null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(`Digest failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      runtime.memoryDb.close();
    }
  }
}
