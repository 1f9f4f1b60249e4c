import { Command, Option } from "clipanion";
import { countRules } from "../../compliance/template-loader.js";
import type { ComplianceTemplate, RuleGroup } from "../../compliance/types.js";
import { loadConfig } from "../../config/loader.js";
import { errorMessage, readTemplate } from "../shared.js";

export class RulesListCommand extends Command {
  static override paths = [["rules", "list"]];

  static override usage = Command.Usage({
    description: "List the compliance rules of a template",
    examples: [
      ["List rules of the configured template", "netcomply rules list"],
      ["List rules of a specific template", "netcomply rules list --template ./ios.yaml"],
    ],
  });

  configPath = Option.String("--config,-c", { description: "Path to netcomply.config.json" });
  templatePath = Option.String("--template,-t", { description: "Golden configuration template (YAML)" });

  async execute(): Promise<number> {
    let template: ComplianceTemplate;
    try {
      const path = this.templatePath ?? loadConfig(this.configPath).audit.templatePath;
      template = await readTemplate(path);
    } catch (err) {
      this.context.stdout.write(`Failed to load template: ${errorMessage(err)}\n`);
      return 1;
    }

    this.context.stdout.write(
      `${template.name} v${template.version} (${countRules(template)} rules)\n`,
    );
    for (const group of [...template.groups, template.forbidden]) {
      this.writeGroup(group);
    }
    return 0;
  }

  private writeGroup(group: RuleGroup): void {
    if (group.rules.length === 0) return;
    this.context.stdout.write(`\n${group.name}:\n`);
    for (const rule of group.rules) {
      this.context.stdout.write(
        `  ${rule.name}  [${rule.severity}] ${rule.kind}\n` +
        `    ${rule.description}\n` +
        `    pattern: ${rule.pattern}\n`,
      );
    }
  }
}
