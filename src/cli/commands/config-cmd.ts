import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { isNotFound, loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { NetcomplyConfig } from "../../config/types.js";
import { errorMessage } from "../shared.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "netcomply config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    let config: NetcomplyConfig;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "netcomply config validate"],
      ["Validate specific file", "netcomply config validate ./my-config.json"],
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
      parseConfigText(content);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${errorMessage(err)}\n`,
      );
      return 1;
    }
  }
}
