import { validateReviewConfig, type ReviewSettings } from "../src/config.js";
import { detectLanguage } from "../src/diff-parser.js";
import type { ChangedLine, FileDiff, Finding, ReviewConfig } from "../src/types.js";

export function makeChangedLines(added: string[], startLine = 1): ChangedLine[] {
  return added.map((content, idx) => ({ lineNumber: startLine + idx, content }));
}

export function makeFileDiff(path: string, added: string[] = [], startLine = 1): FileDiff {
  return {
    path,
    status: "modified",
    language: detectLanguage(path),
    hunks: [],
    changedLines: makeChangedLines(added, startLine),
  };
}

export function makeConfig(overrides: ReviewSettings = {}): ReviewConfig {
  return validateReviewConfig({
    maxLineLength: 80,
    maxInlineComments: 5,
    ...overrides,
  });
}

export function makeFinding(
  partial: Partial<Finding> & Pick<Finding, "file" | "line" | "severity">
): Finding {
  return {
    analyzer: "lint",
    ruleId: `rule-${partial.severity}`,
    message: `${partial.severity} at ${partial.file}:${partial.line}`,
    ...partial,
  };
}
