export type TemplateErrorKind =
  | "InvalidDocument"
  | "MissingField"
  | "InvalidSeverity"
  | "InvalidPattern"
  | "InvalidScope"
  | "DuplicateRule";

export interface RuleLocation {
  readonly group: string;
  readonly index: number;
  readonly rule?: string;
}

export class TemplateError extends Error {
  override readonly name = "TemplateError";

  constructor(
    readonly kind: TemplateErrorKind,
    readonly reason: string,
    readonly location?: RuleLocation,
  ) {
    super(TemplateError.format(kind, reason, location));
  }

  private static format(
    kind: TemplateErrorKind,
    reason: string,
    location?: RuleLocation,
  ): string {
    if (!location) return `${kind}: ${reason}`;
    const rule = location.rule ? ` (${location.rule})` : "";
    return `${kind}: ${location.group}[${location.index}]${rule}: ${reason}`;
  }
}

export class ReportError extends Error {
  override readonly name = "ReportError";
}
