import { ReportError } from "./errors.js";
import {
  SEVERITIES,
  compareSeverity,
  emptyCounts,
  type DeviceAuditResult,
  type FleetReport,
  type UnreachableDevice,
  type Violation,
} from "./types.js";

/**
 * Combine per-device results into a fleet report. Devices keep the order
 * they were submitted in; inputs are never mutated.
 */
export function aggregate(
  results: readonly DeviceAuditResult[],
  unreachable: readonly UnreachableDevice[] = [],
): FleetReport {
  const seen = new Set<string>();
  for (const { deviceId } of [...results, ...unreachable]) {
    if (seen.has(deviceId)) {
      throw new ReportError(`Device '${deviceId}' appears more than once in one run`);
    }
    seen.add(deviceId);
  }

  const bySeverity = emptyCounts();
  let violations = 0;
  let compliant = 0;

  for (const result of results) {
    for (const severity of SEVERITIES) bySeverity[severity] += result.counts[severity];
    violations += result.violations.length;
    if (result.status === "PASS") compliant++;
  }

  const audited = results.length;

  return {
    devices: [...results],
    unreachable: [...unreachable],
    totals: {
      devices: audited + unreachable.length,
      compliant,
      nonCompliant: audited - compliant,
      unreachable: unreachable.length,
      violations,
      bySeverity,
      complianceRate: audited > 0 ? (compliant / audited) * 100 : 0,
    },
  };
}

/** Copy of the violations ordered HIGH to LOW, stable within a level. */
export function sortBySeverity(violations: readonly Violation[]): Violation[] {
  return [...violations].sort((a, b) => compareSeverity(a.severity, b.severity));
}
