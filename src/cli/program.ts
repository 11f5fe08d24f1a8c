import { Builtins, Cli } from "clipanion";
import { ServeCommand } from "./commands/serve.js";
import { DigestRunCommand } from "./commands/digest-cmd.js";
import {
  MemoryEventsCommand,
  MemoryRulesAddCommand,
  MemoryRulesListCommand,
} from "./commands/memory-cmd.js";
import { ConfigValidateCommand } from "./commands/config-cmd.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "LeadSync",
    binaryName: "leadsync",
    binaryVersion: VERSION,
  });

  cli.register(ServeCommand);
  cli.register(DigestRunCommand);

  // Memory store
  cli.register(MemoryEventsCommand);
  cli.register(MemoryRulesListCommand);
  cli.register(MemoryRulesAddCommand);

  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
