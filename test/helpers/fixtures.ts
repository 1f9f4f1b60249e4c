import * as yaml from "js-yaml";
import { createSilentLogger, type Logger } from "../../src/logging/logger.js";
import { loadTemplate } from "../../src/compliance/template-loader.js";
import type { ComplianceRule, ComplianceTemplate } from "../../src/compliance/types.js";

/** Build a template from a plain document, going through the YAML loader. */
export function templateFrom(document: Record<string, unknown>): ComplianceTemplate {
  return loadTemplate(yaml.dump(document));
}

/** A single compiled rule with the given pattern. */
export function ruleFrom(pattern: string, extra: Record<string, unknown> = {}): ComplianceRule {
  const template = templateFrom({
    golden_config: {
      global_config: [{ pattern, description: "Test rule", ...extra }],
    },
  });
  return template.groups[0].rules[0];
}

/**
 * Two required rules (HIGH, MEDIUM), one optional rule (LOW) and one
 * forbidden rule (HIGH).
 */
export function makeTemplate(): ComplianceTemplate {
  return templateFrom({
    golden_config: {
      name: "Test Template",
      version: "1.0",
      global_config: [
        { name: "enable_secret", pattern: "enable secret", description: "Enable secret must be configured", severity: "HIGH" },
        { name: "ntp", pattern: "ntp server", description: "NTP server should be configured", severity: "MEDIUM" },
      ],
      routing_config: [
        { name: "routing", pattern: "router ospf|router bgp", description: "Configure routing protocol", required: false, severity: "LOW" },
      ],
    },
    forbidden_config: [
      { name: "no_telnet", pattern: "transport input telnet", description: "Telnet should be disabled", severity: "HIGH" },
    ],
  });
}

export const COMPLIANT_CONFIG = [
  "hostname R1",
  "enable secret 5 test-secret",
  "ntp server 192.0.2.1",
  "line vty 0 4",
  " transport input ssh",
].join("\n");

export function silentLogger(): Logger {
  return createSilentLogger();
}
