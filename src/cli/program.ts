import { Builtins, Cli } from "clipanion";
import { AuditCommand } from "./commands/audit.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import { RulesListCommand } from "./commands/rules.js";
import { TemplateValidateCommand } from "./commands/template.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Network Compliance Auditor",
    binaryName: "netcomply",
    binaryVersion: VERSION,
  });

  cli.register(AuditCommand);

  // Template inspection
  cli.register(RulesListCommand);
  cli.register(TemplateValidateCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
