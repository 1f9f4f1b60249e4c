import { Command, Option } from "clipanion";
import { resolve } from "node:path";
import { DirectoryConfigSource } from "../../audit/config-source.js";
import { AuditRunner } from "../../audit/runner.js";
import { ComplianceEngine } from "../../compliance/engine.js";
import type { ComplianceTemplate } from "../../compliance/types.js";
import { loadConfig } from "../../config/loader.js";
import type { NetcomplyConfig } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";
import { exportReport } from "../../report/export.js";
import { renderReport } from "../../report/render.js";
import { errorMessage, readTemplate } from "../shared.js";

export class AuditCommand extends Command {
  static override paths = [["audit"]];

  static override usage = Command.Usage({
    description: "Audit device configurations against a golden template",
    details: `
      Reads each device's running configuration from \`<configs>/<device>.cfg\`,
      evaluates it against the template and prints a compliance report.
      Exits with 1 when any device fails or is unreachable.
    `,
    examples: [
      ["Audit the devices listed in the config file", "netcomply audit"],
      ["Audit two devices with a custom template", "netcomply audit --template ./ios.yaml Router1 Switch1"],
      ["Audit without writing a report file", "netcomply audit --no-export"],
    ],
  });

  configPath = Option.String("--config,-c", { description: "Path to netcomply.config.json" });
  templatePath = Option.String("--template,-t", { description: "Golden configuration template (YAML)" });
  configDir = Option.String("--configs", { description: "Directory holding <device>.cfg files" });
  reportDir = Option.String("--out,-o", { description: "Directory for the exported YAML report" });
  writeReport = Option.Boolean("--export", { description: "Export the report as YAML (default from config)" });
  color = Option.Boolean("--color", { description: "Colorize console output" });
  devices = Option.Rest();

  async execute(): Promise<number> {
    let config: NetcomplyConfig;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    const templatePath = this.templatePath ?? config.audit.templatePath;
    let template: ComplianceTemplate;
    try {
      template = await readTemplate(templatePath);
    } catch (err) {
      this.context.stdout.write(`Failed to load template ${templatePath}: ${errorMessage(err)}\n`);
      return 1;
    }

    const deviceIds = this.devices.length > 0 ? this.devices : config.devices;
    if (deviceIds.length === 0) {
      this.context.stdout.write("No devices to audit. Pass device ids or list them under 'devices' in the config.\n");
      return 1;
    }

    const logger = createLogger(config.logging);
    const source = new DirectoryConfigSource(resolve(this.configDir ?? config.audit.configDir));
    const runner = new AuditRunner(new ComplianceEngine(template), source, logger, {
      concurrency: config.audit.concurrency,
      timeoutMs: config.audit.timeoutMs,
      retry: config.retry,
    });

    const report = await runner.run(deviceIds);

    this.context.stdout.write(
      renderReport(report, {
        color: this.color ?? this.context.colorDepth > 1,
        title: `Compliance Summary: ${template.name} v${template.version}`,
      }),
    );

    if (this.writeReport ?? config.audit.export) {
      const path = await exportReport(report, resolve(this.reportDir ?? config.audit.reportDir), new Date(), template);
      this.context.stdout.write(`Report exported to ${path}\n`);
    }

    return report.totals.violations === 0 && report.totals.unreachable === 0 ? 0 : 1;
  }
}
