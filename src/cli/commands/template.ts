import { Command, Option } from "clipanion";
import { countRules } from "../../compliance/template-loader.js";
import { loadConfig } from "../../config/loader.js";
import { errorMessage, readTemplate } from "../shared.js";

export class TemplateValidateCommand extends Command {
  static override paths = [["template", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a golden configuration template",
    examples: [
      ["Validate the configured template", "netcomply template validate"],
      ["Validate a specific file", "netcomply template validate ./ios.yaml"],
    ],
  });

  templateFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    let path: string;
    try {
      path = this.templateFile ?? loadConfig().audit.templatePath;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    try {
      const template = await readTemplate(path);
      const groups = template.groups.length + (template.forbidden.rules.length > 0 ? 1 : 0);
      this.context.stdout.write(
        `Template is valid: ${path} (${countRules(template)} rules in ${groups} groups)\n`,
      );
      return 0;
    } catch (err) {
      this.context.stdout.write(`Template is INVALID: ${path}\n  ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
