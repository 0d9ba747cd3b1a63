import * as core from "@actions/core";
import { AnalyzerError } from "../errors.js";
import type { FileDiff, Finding, ReviewConfig } from "../types.js";
import { isAllowlisted, type Analyzer } from "./common.js";
import { complexityAnalyzer } from "./complexity.js";
import { lintAnalyzer } from "./lint.js";
import { securityPatternAnalyzer } from "./security-pattern.js";

/** Registration order. Findings for a file come out in this order. */
export const DEFAULT_ANALYZERS: readonly Analyzer[] = [
  lintAnalyzer,
  securityPatternAnalyzer,
  complexityAnalyzer,
];

/**
 * Run every registered analyzer over one file's changed lines.
 *
 * A throwing analyzer is logged and contributes nothing; the rest still run.
 * Findings pointing outside the changed lines, or allowlisted by config, are dropped.
 */
export function runAnalyzers(
  file: FileDiff,
  config: ReviewConfig,
  analyzers: readonly Analyzer[] = DEFAULT_ANALYZERS
): Finding[] {
  if (file.changedLines.length === 0) return [];

  const changedLineNumbers = new Set(file.changedLines.map((line) => line.lineNumber));
  const findings: Finding[] = [];

  for (const analyzer of analyzers) {
    let produced: Finding[];
    try {
      if (!analyzer.appliesTo(file)) {
        core.debug(`${analyzer.name}: skipping ${file.path}`);
        continue;
      }
      produced = analyzer.analyze(file, file.changedLines, config);
    } catch (err) {
      core.warning(new AnalyzerError(analyzer.name, file.path, err).message);
      continue;
    }

    const accepted = produced.filter((finding) => {
      if (finding.file !== file.path || !changedLineNumbers.has(finding.line)) {
        core.warning(
          `${analyzer.name}: dropping ${finding.ruleId} at ${finding.file}:${finding.line}, not a changed line of ${file.path}`
        );
        return false;
      }
      if (isAllowlisted(finding.file, finding.ruleId, config.allowlist)) {
        core.debug(`${analyzer.name}: ${finding.ruleId} allowlisted for ${finding.file}`);
        return false;
      }
      return true;
    });

    // Array.prototype.sort is stable, so same-line findings keep rule order
    findings.push(...accepted.sort((a, b) => a.line - b.line));
  }

  return findings;
}
