import * as yaml from "js-yaml";
import type { ZodIssue } from "zod";
import { TemplateError, type RuleLocation } from "./errors.js";
import {
  METADATA_KEYS,
  ruleEntrySchema,
  templateDocumentSchema,
  templateMetadataSchema,
  type RuleEntry,
} from "./template-schema.js";
import {
  RULE_SCOPES,
  SEVERITIES,
  type ComplianceRule,
  type ComplianceTemplate,
  type RuleGroup,
  type RuleKind,
  type RuleScope,
  type Severity,
} from "./types.js";

const FORBIDDEN_GROUP = "forbidden_config";
const GROUP_SUFFIX = /_config$/;

interface RawGroup {
  readonly name: string;
  readonly scope: RuleScope;
  readonly entries: readonly unknown[];
}

/**
 * Parse a golden-configuration template (YAML, or JSON as a YAML subset)
 * into a validated, frozen ComplianceTemplate. Every rule's pattern is
 * compiled here, once, and carried on the rule.
 */
export function loadTemplate(source: string): ComplianceTemplate {
  const document = parseDocument(source);
  const golden = document.golden_config;

  const metadata = templateMetadataSchema.safeParse({
    name: golden["name"],
    version: golden["version"],
    description: golden["description"],
  });
  if (!metadata.success) {
    throw new TemplateError("InvalidDocument", `invalid template metadata: ${describeIssues(metadata.error.issues)}`);
  }

  const rawGroups: RawGroup[] = [];
  const forbiddenEntries: unknown[] = [];

  for (const [key, value] of Object.entries(golden)) {
    if (METADATA_KEYS.has(key)) continue;
    const entries = expectArray(key, value);
    const scope = scopeForGroup(key);
    if (scope === "forbidden") {
      forbiddenEntries.push(...entries);
    } else {
      rawGroups.push({ name: key, scope, entries });
    }
  }
  if (document.forbidden_config) {
    forbiddenEntries.push(...document.forbidden_config);
  }

  const forbiddenGroup: RawGroup = { name: FORBIDDEN_GROUP, scope: "forbidden", entries: forbiddenEntries };
  const names = new NameRegistry();

  const drafts = [...rawGroups, forbiddenGroup].map((group) =>
    group.entries.map((entry, index) => buildRule(entry, { group: group.name, index }, group.scope, group === forbiddenGroup)),
  );

  // Explicit names first, so a generated name never takes one declared later.
  for (const draft of drafts.flat()) {
    if (draft.name !== undefined) names.claim(draft.name, draft.at);
  }
  const named = drafts.map((rules) =>
    rules.map(({ rule, name, at }) => Object.freeze({ ...rule, name: name ?? names.generate(rule.description, at) })),
  );

  const groups = rawGroups.map((group, i) => freezeGroup(group.name, group.scope, named[i]));
  const forbidden = freezeGroup(FORBIDDEN_GROUP, "forbidden", named[rawGroups.length]);

  return Object.freeze({
    name: metadata.data.name,
    version: metadata.data.version,
    description: metadata.data.description,
    groups: Object.freeze(groups),
    forbidden,
  });
}

/** Total number of rules across all groups, the forbidden group included. */
export function countRules(template: ComplianceTemplate): number {
  return template.groups.reduce((sum, group) => sum + group.rules.length, template.forbidden.rules.length);
}

function parseDocument(source: string): { golden_config: Record<string, unknown>; forbidden_config?: unknown[] } {
  let raw: unknown;
  try {
    raw = yaml.load(source);
  } catch (err) {
    throw new TemplateError("InvalidDocument", `unparseable template: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = templateDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TemplateError("InvalidDocument", `expected a golden_config mapping: ${describeIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

function expectArray(group: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new TemplateError("InvalidDocument", `rule group '${group}' must be a list of rules`);
  }
  return value;
}

function scopeForGroup(key: string): RuleScope {
  const scope = parseScope(key.replace(GROUP_SUFFIX, ""));
  if (!scope) {
    throw new TemplateError(
      "InvalidScope",
      `rule group '${key}' does not name a known scope (${RULE_SCOPES.join(", ")})`,
    );
  }
  return scope;
}

function parseScope(value: string): RuleScope | undefined {
  return RULE_SCOPES.find((scope) => scope === value);
}

function parseSeverity(value: string): Severity | undefined {
  const normalized = value.toUpperCase();
  return SEVERITIES.find((severity) => severity === normalized);
}

interface RuleDraft {
  readonly rule: Omit<ComplianceRule, "name">;
  readonly name: string | undefined;
  readonly at: RuleLocation;
}

function buildRule(
  entry: unknown,
  location: RuleLocation,
  groupScope: RuleScope,
  forbidden: boolean,
): RuleDraft {
  const at: RuleLocation = { ...location, rule: ruleLabel(entry) };
  const parsed = ruleEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw entryError(parsed.error.issues, at);
  }
  const raw: RuleEntry = parsed.data;

  const severity = parseSeverity(raw.severity);
  if (!severity) {
    throw new TemplateError(
      "InvalidSeverity",
      `severity '${raw.severity}' is not one of ${SEVERITIES.join(", ")}`,
      at,
    );
  }

  let scope = groupScope;
  if (raw.scope !== undefined) {
    const override = parseScope(raw.scope);
    if (!override) {
      throw new TemplateError("InvalidScope", `scope '${raw.scope}' is not a known scope`, at);
    }
    scope = override;
  }

  let expression: RegExp;
  try {
    expression = new RegExp(raw.pattern, "m");
  } catch (err) {
    throw new TemplateError(
      "InvalidPattern",
      `pattern '${raw.pattern}' does not compile: ${err instanceof Error ? err.message : String(err)}`,
      at,
    );
  }

  const kind: RuleKind = forbidden ? "forbidden" : raw.required ? "required" : "optional";

  return {
    rule: {
      description: raw.description,
      pattern: raw.pattern,
      expression,
      required: forbidden ? false : raw.required,
      kind,
      severity,
      scope,
    },
    name: raw.name,
    at,
  };
}

function freezeGroup(name: string, scope: RuleScope, rules: ComplianceRule[]): RuleGroup {
  return Object.freeze({ name, scope, rules: Object.freeze(rules) });
}

function entryError(issues: readonly ZodIssue[], at: RuleLocation): TemplateError {
  const field = issues[0]?.path[0];
  if (field === "pattern" || field === "description") {
    return new TemplateError("MissingField", `'${field}' must be a non-empty string`, at);
  }
  if (field === "severity") {
    return new TemplateError("InvalidSeverity", "severity must be a string", at);
  }
  return new TemplateError("InvalidDocument", describeIssues(issues), at);
}

function describeIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function ruleLabel(entry: unknown): string | undefined {
  if (typeof entry !== "object" || entry === null) return undefined;
  const name: unknown = Reflect.get(entry, "name");
  if (typeof name === "string" && name.length > 0) return name;
  const pattern: unknown = Reflect.get(entry, "pattern");
  if (typeof pattern === "string" && pattern.length > 0) return pattern;
  return undefined;
}

/** Hands out unique rule names; explicit duplicates are an error, generated ones get a suffix. */
class NameRegistry {
  private readonly taken = new Set<string>();

  claim(name: string, at: RuleLocation): string {
    if (this.taken.has(name)) {
      throw new TemplateError("DuplicateRule", `rule name '${name}' is already defined`, at);
    }
    this.taken.add(name);
    return name;
  }

  generate(description: string, at: RuleLocation): string {
    const base = slugify(description) || `${at.group}_${at.index + 1}`;
    let candidate = base;
    for (let n = 2; this.taken.has(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    this.taken.add(candidate);
    return candidate;
  }
}

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}
