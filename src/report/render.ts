import { sortBySeverity } from "../compliance/report.js";
import type { FleetReport, Severity, Violation } from "../compliance/types.js";

export interface RenderOptions {
  readonly color?: boolean;
  readonly title?: string;
}

const SEVERITY_COLOR: Record<Severity, string> = {
  HIGH: "\x1b[31m",
  MEDIUM: "\x1b[33m",
  LOW: "\x1b[32m",
};
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const RESET = "\x1b[0m";
const MAX_EVIDENCE = 50;

const COLUMNS = ["Device", "Total", "High", "Medium", "Low", "Status"] as const;

/** Plain-text console rendering of a fleet report. */
export function renderReport(report: FleetReport, options: RenderOptions = {}): string {
  const paint = (code: string, text: string): string =>
    options.color ? `${code}${text}${RESET}` : text;

  const lines: string[] = [];
  lines.push(options.title ?? "Compliance Summary");

  const rows: string[][] = report.devices.map((device) => [
    device.deviceId,
    String(device.violations.length),
    String(device.counts.HIGH),
    String(device.counts.MEDIUM),
    String(device.counts.LOW),
    device.status,
  ]);
  for (const device of report.unreachable) {
    rows.push([device.deviceId, "-", "-", "-", "-", "UNREACHABLE"]);
  }

  const widths = COLUMNS.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => row[col].length)),
  );
  const formatRow = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => (col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col])))
      .join("  ")
      .trimEnd();

  lines.push(formatRow(COLUMNS));
  for (const row of rows) lines.push(formatRow(row));

  for (const device of report.devices) {
    lines.push("");
    if (device.status === "PASS") {
      lines.push(paint(GREEN, `${device.deviceId}: all compliance checks passed`));
      continue;
    }
    lines.push(paint(RED, `Violations for ${device.deviceId}:`));
    for (const violation of sortBySeverity(device.violations)) {
      lines.push(...renderViolation(violation, paint));
    }
  }

  if (report.unreachable.length > 0) {
    lines.push("", paint(RED, "Unreachable devices:"));
    for (const device of report.unreachable) {
      lines.push(`  ${device.deviceId}: ${device.reason}`);
    }
  }

  const { totals } = report;
  lines.push(
    "",
    `Total devices: ${totals.devices}`,
    `Compliant: ${totals.compliant}`,
    `Non-compliant: ${totals.nonCompliant}`,
    `Unreachable: ${totals.unreachable}`,
    `Compliance rate: ${totals.complianceRate.toFixed(1)}%`,
    "",
  );

  if (totals.violations === 0 && totals.unreachable === 0) {
    lines.push(paint(GREEN, "COMPLIANCE AUDIT PASSED"));
  } else {
    lines.push(
      paint(
        RED,
        `COMPLIANCE AUDIT FAILED: ${totals.violations} violations across ${report.devices.length} devices`,
      ),
    );
  }

  return lines.join("\n") + "\n";
}

function renderViolation(
  violation: Violation,
  paint: (code: string, text: string) => string,
): string[] {
  const lines = [
    `  ${paint(SEVERITY_COLOR[violation.severity], `[${violation.severity}]`)} ${violation.rule}  ${violation.violationType}  ${violation.description}`,
  ];
  if (violation.found) {
    lines.push(`      found (line ${violation.found.line}): ${truncate(violation.found.text)}`);
  } else {
    lines.push(`      expected: ${violation.expected}`);
  }
  return lines;
}

function truncate(text: string): string {
  return text.length > MAX_EVIDENCE ? `${text.slice(0, MAX_EVIDENCE)}...` : text;
}
