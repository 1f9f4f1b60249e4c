import type { ComplianceRule, MatchOutcome } from "./types.js";

export type ConfigText = string | readonly string[];

export function joinConfig(configText: ConfigText): string {
  return typeof configText === "string" ? configText : configText.join("\n");
}

/**
 * Search the whole configuration for the rule's compiled expression.
 * The expression carries the multiline flag, so `^` and `$` anchor at
 * line boundaries while alternations and substrings match anywhere.
 */
export function evaluate(rule: ComplianceRule, configText: ConfigText): MatchOutcome {
  const text = joinConfig(configText);
  const match = rule.expression.exec(text);
  if (!match) return { outcome: "not_found" };

  // A match that begins with a line break belongs to the line after it.
  const start = match.index + leadingBreak(match[0]);
  const lineStart = start === 0 ? 0 : text.lastIndexOf("\n", start - 1) + 1;
  const newline = text.indexOf("\n", start);
  const lineEnd = newline === -1 ? text.length : newline;

  return {
    outcome: "found",
    line: countLines(text, lineStart),
    text: text.slice(lineStart, lineEnd).trim(),
  };
}

function leadingBreak(matched: string): number {
  if (matched.startsWith("\r\n")) return 2;
  return matched.startsWith("\n") ? 1 : 0;
}

function countLines(text: string, end: number): number {
  let line = 1;
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}
