export const SEVERITIES = ["HIGH", "MEDIUM", "LOW"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

/** Sort comparator putting higher severities first. */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[b] - SEVERITY_RANK[a];
}

export const RULE_SCOPES = [
  "global",
  "interface",
  "line",
  "security",
  "routing",
  "forbidden",
] as const;
export type RuleScope = (typeof RULE_SCOPES)[number];

/**
 * How a rule is enforced:
 * - required: pattern must be present, absence is a violation
 * - optional: informational, outcome is recorded but never penalized
 * - forbidden: pattern must be absent, presence is a violation
 */
export type RuleKind = "required" | "optional" | "forbidden";

export interface ComplianceRule {
  readonly name: string;
  readonly description: string;
  readonly pattern: string;
  readonly expression: RegExp;
  readonly required: boolean;
  readonly kind: RuleKind;
  readonly severity: Severity;
  readonly scope: RuleScope;
}

export interface RuleGroup {
  readonly name: string;
  readonly scope: RuleScope;
  readonly rules: readonly ComplianceRule[];
}

export interface ComplianceTemplate {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly groups: readonly RuleGroup[];
  readonly forbidden: RuleGroup;
}

export type MatchOutcome =
  | { readonly outcome: "found"; readonly line: number; readonly text: string }
  | { readonly outcome: "not_found" };

export type ViolationType = "MISSING_REQUIRED" | "FORBIDDEN_PRESENT";

export interface Evidence {
  readonly line: number;
  readonly text: string;
}

export interface Violation {
  readonly rule: string;
  readonly description: string;
  readonly severity: Severity;
  readonly scope: RuleScope;
  readonly violationType: ViolationType;
  readonly expected: string;
  readonly found?: Evidence;
}

export interface RuleCheck {
  readonly rule: string;
  readonly kind: RuleKind;
  readonly outcome: MatchOutcome["outcome"];
}

export type SeverityCounts = Readonly<Record<Severity, number>>;

export type AuditStatus = "PASS" | "FAIL";

export interface DeviceAuditResult {
  readonly deviceId: string;
  readonly violations: readonly Violation[];
  readonly checks: readonly RuleCheck[];
  readonly counts: SeverityCounts;
  readonly status: AuditStatus;
}

export interface UnreachableDevice {
  readonly deviceId: string;
  readonly reason: string;
}

export interface FleetTotals {
  readonly devices: number;
  readonly compliant: number;
  readonly nonCompliant: number;
  readonly unreachable: number;
  readonly violations: number;
  readonly bySeverity: SeverityCounts;
  /** Percentage of audited devices that passed, 0 for an empty fleet. */
  readonly complianceRate: number;
}

export interface FleetReport {
  readonly devices: readonly DeviceAuditResult[];
  readonly unreachable: readonly UnreachableDevice[];
  readonly totals: FleetTotals;
}

export function emptyCounts(): Record<Severity, number> {
  return { HIGH: 0, MEDIUM: 0, LOW: 0 };
}
