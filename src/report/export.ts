import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import * as yaml from "js-yaml";
import type { ComplianceTemplate, FleetReport } from "../compliance/types.js";

export interface ReportViolationEntry {
  readonly rule: string;
  readonly severity: string;
  readonly type: string;
  readonly scope: string;
  readonly description: string;
  readonly found_config: string;
  readonly expected_config: string;
}

export interface ReportDeviceEntry {
  readonly device: string;
  readonly status: string;
  readonly total_violations: number;
  readonly severity: Record<string, number>;
  readonly violations: ReportViolationEntry[];
}

export interface ReportUnreachableEntry {
  readonly device: string;
  readonly reason: string;
}

export interface ReportDocument {
  readonly compliance_report: {
    readonly timestamp: string;
    readonly template?: { readonly name: string; readonly version: string };
    readonly summary: {
      readonly total_devices: number;
      readonly compliant_devices: number;
      readonly non_compliant_devices: number;
      readonly unreachable_devices: number;
      readonly total_violations: number;
      readonly severity_breakdown: Record<string, number>;
      readonly compliance_percentage: number;
    };
    readonly devices: ReportDeviceEntry[];
    readonly unreachable: ReportUnreachableEntry[];
  };
}

export function toReportDocument(
  report: FleetReport,
  timestamp: Date,
  template?: ComplianceTemplate,
): ReportDocument {
  // Ordered sequences: device ids are arbitrary strings, never object keys.
  const devices = report.devices.map((device): ReportDeviceEntry => ({
    device: device.deviceId,
    status: device.status,
    total_violations: device.violations.length,
    severity: { ...device.counts },
    violations: device.violations.map((v) => ({
      rule: v.rule,
      severity: v.severity,
      type: v.violationType,
      scope: v.scope,
      description: v.description,
      found_config: v.found ? v.found.text : "NOT FOUND",
      expected_config: v.violationType === "FORBIDDEN_PRESENT" ? "SHOULD NOT BE PRESENT" : v.expected,
    })),
  }));

  const unreachable = report.unreachable.map(({ deviceId, reason }) => ({ device: deviceId, reason }));

  const { totals } = report;
  return {
    compliance_report: {
      timestamp: timestamp.toISOString(),
      ...(template ? { template: { name: template.name, version: template.version } } : {}),
      summary: {
        total_devices: totals.devices,
        compliant_devices: totals.compliant,
        non_compliant_devices: totals.nonCompliant,
        unreachable_devices: totals.unreachable,
        total_violations: totals.violations,
        severity_breakdown: { ...totals.bySeverity },
        compliance_percentage: Math.round(totals.complianceRate * 10) / 10,
      },
      devices,
      unreachable,
    },
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `compliance_report_YYYYMMDD_HHMMSS.yaml`, in local time. */
export function reportFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `compliance_report_${day}_${time}.yaml`;
}

export function serializeReport(document: ReportDocument): string {
  return yaml.dump(document, { noRefs: true, lineWidth: -1 });
}

export async function exportReport(
  report: FleetReport,
  dir: string,
  now: Date = new Date(),
  template?: ComplianceTemplate,
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, reportFileName(now));
  await writeFile(path, serializeReport(toReportDocument(report, now, template)), "utf-8");
  return path;
}
