import { evaluate, joinConfig, type ConfigText } from "./matcher.js";
import {
  emptyCounts,
  type ComplianceRule,
  type ComplianceTemplate,
  type DeviceAuditResult,
  type RuleCheck,
  type Violation,
} from "./types.js";

/**
 * Evaluate every rule of the template against one device's configuration.
 * Violations keep rule-definition order: declared groups first, the
 * forbidden group last. An empty configuration is a valid input.
 */
export function audit(
  template: ComplianceTemplate,
  deviceId: string,
  configText: ConfigText,
): DeviceAuditResult {
  const text = joinConfig(configText);
  const violations: Violation[] = [];
  const checks: RuleCheck[] = [];

  for (const group of template.groups) {
    for (const rule of group.rules) {
      const match = evaluate(rule, text);
      checks.push({ rule: rule.name, kind: rule.kind, outcome: match.outcome });
      // Optional rules are recorded in checks only.
      if (rule.kind === "required" && match.outcome === "not_found") {
        violations.push(missing(rule));
      }
    }
  }

  for (const rule of template.forbidden.rules) {
    const match = evaluate(rule, text);
    checks.push({ rule: rule.name, kind: rule.kind, outcome: match.outcome });
    if (match.outcome === "found") {
      violations.push({
        rule: rule.name,
        description: rule.description,
        severity: rule.severity,
        scope: rule.scope,
        violationType: "FORBIDDEN_PRESENT",
        expected: rule.pattern,
        found: { line: match.line, text: match.text },
      });
    }
  }

  const counts = emptyCounts();
  for (const violation of violations) counts[violation.severity]++;

  return {
    deviceId,
    violations,
    checks,
    counts,
    status: violations.length === 0 ? "PASS" : "FAIL",
  };
}

function missing(rule: ComplianceRule): Violation {
  return {
    rule: rule.name,
    description: rule.description,
    severity: rule.severity,
    scope: rule.scope,
    violationType: "MISSING_REQUIRED",
    expected: rule.pattern,
  };
}

/** Holds a loaded template and audits devices against it. Safe to share across concurrent audits. */
export class ComplianceEngine {
  constructor(readonly template: ComplianceTemplate) {}

  audit(deviceId: string, configText: ConfigText): DeviceAuditResult {
    return audit(this.template, deviceId, configText);
  }

  rules(): ComplianceRule[] {
    return [
      ...this.template.groups.flatMap((group) => group.rules),
      ...this.template.forbidden.rules,
    ];
  }
}
