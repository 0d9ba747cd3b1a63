import type { ChangedLineSet, FileDiff, Finding, ReviewConfig } from "../types.js";
import { createFinding, matchLineRules, toEvidence, type Analyzer, type LineRule } from "./common.js";

/**
 * Nesting estimate a window of consecutive changed lines may reach before it
 * is flagged. This is a keyword count, not a control-flow analysis.
 */
export const COMPLEXITY_THRESHOLD = 4;

// "else if" counts once
const NESTING_TOKEN_REGEX =
  /\belse\s+if\b|\b(?:if|elif|for|foreach|while|switch|case|try|catch|except|finally)\b/g;

const BOOLEAN_OPERATOR_REGEX = /\s(?:and|or)\s|&&|\|\|/g;

export function countNestingTokens(content: string): number {
  return content.match(NESTING_TOKEN_REGEX)?.length ?? 0;
}

export const COMPLEXITY_RULES: readonly LineRule[] = [
  {
    id: "complexity-boolean-density",
    severity: "warning",
    when: (content) => (content.match(BOOLEAN_OPERATOR_REGEX)?.length ?? 0) >= 3,
    message: "Changed line has a dense boolean expression; consider extracting named sub-expressions.",
  },
  {
    id: "complexity-nested-ternary",
    severity: "warning",
    languages: ["javascript", "typescript"],
    // Optional chaining and nullish coalescing are not ternaries
    when: (content) => /\?.*:.*\?.*:/.test(content.replace(/\?\?|\?\./g, "")),
    message: "Nested ternary detected on changed line; consider clearer control flow.",
  },
];

export const complexityAnalyzer: Analyzer = {
  name: "complexity",
  appliesTo: () => true,
  analyze(file: FileDiff, lines: ChangedLineSet, config: ReviewConfig): Finding[] {
    const findings: Finding[] = [];
    let estimate = 0;
    let previousLine: number | undefined;

    for (const line of lines) {
      // A gap in line numbers starts a new window
      if (previousLine === undefined || line.lineNumber !== previousLine + 1) estimate = 0;
      previousLine = line.lineNumber;

      estimate += countNestingTokens(line.content);
      if (estimate > COMPLEXITY_THRESHOLD) {
        findings.push(
          createFinding({
            analyzer: "complexity",
            ruleId: "complexity-nesting",
            severity: "warning",
            file: file.path,
            line: line.lineNumber,
            message: `Branch/loop/exception keywords in this block of changed lines reached ${estimate} (threshold: ${COMPLEXITY_THRESHOLD}); consider extracting a function.`,
            evidence: toEvidence(line.content),
          })
        );
        estimate = 0;
      }

      findings.push(...matchLineRules("complexity", COMPLEXITY_RULES, file, line, config));
    }

    return findings;
  },
};
