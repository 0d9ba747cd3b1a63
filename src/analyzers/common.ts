import { minimatch } from "minimatch";
import type {
  AllowlistEntry,
  AnalyzerName,
  ChangedLine,
  ChangedLineSet,
  FileDiff,
  Finding,
  ReviewConfig,
  Severity,
} from "../types.js";

export interface Analyzer {
  readonly name: AnalyzerName;
  /** Files this analyzer does not apply to are skipped without a finding. */
  appliesTo(file: FileDiff): boolean;
  analyze(file: FileDiff, lines: ChangedLineSet, config: ReviewConfig): Finding[];
}

/**
 * One row of an analyzer's rule table. A rule fires on a line when every
 * condition it declares holds: `pattern` matches, `unless` does not match,
 * and `when` returns true.
 */
export interface LineRule {
  id: string;
  severity: Severity;
  message: string | ((content: string, config: ReviewConfig) => string);
  languages?: readonly string[];
  pattern?: RegExp;
  unless?: RegExp;
  when?: (content: string, config: ReviewConfig) => boolean;
}

interface FindingParams {
  analyzer: AnalyzerName;
  ruleId: string;
  severity: Severity;
  file: string;
  line: number;
  message: string;
  evidence?: string;
}

const EVIDENCE_MAX_LENGTH = 160;

export function createFinding(params: FindingParams): Finding {
  return Object.freeze({
    analyzer: params.analyzer,
    ruleId: params.ruleId,
    severity: params.severity,
    file: params.file,
    line: params.line,
    message: params.message,
    evidence: params.evidence,
  });
}

export function toEvidence(content: string): string {
  const trimmed = content.trim();
  if (!trimmed) return "<empty line>";
  return trimmed.length > EVIDENCE_MAX_LENGTH ? `${trimmed.slice(0, EVIDENCE_MAX_LENGTH)}…` : trimmed;
}

export function ruleAppliesToLanguage(rule: LineRule, language: string): boolean {
  return !rule.languages || rule.languages.includes(language);
}

export function ruleMatches(rule: LineRule, content: string, config: ReviewConfig): boolean {
  if (rule.pattern && !rule.pattern.test(content)) return false;
  if (rule.unless && rule.unless.test(content)) return false;
  if (rule.when && !rule.when(content, config)) return false;
  return true;
}

/**
 * Evaluate a rule table against a single changed line, in table order.
 */
export function matchLineRules(
  analyzer: AnalyzerName,
  rules: readonly LineRule[],
  file: FileDiff,
  line: ChangedLine,
  config: ReviewConfig
): Finding[] {
  const findings: Finding[] = [];

  for (const rule of rules) {
    if (!ruleAppliesToLanguage(rule, file.language)) continue;
    if (!ruleMatches(rule, line.content, config)) continue;

    findings.push(
      createFinding({
        analyzer,
        ruleId: rule.id,
        severity: rule.severity,
        file: file.path,
        line: line.lineNumber,
        message: typeof rule.message === "string" ? rule.message : rule.message(line.content, config),
        evidence: toEvidence(line.content),
      })
    );
  }

  return findings;
}

/**
 * Evaluate a rule table against every changed line. Findings come out in
 * ascending line order, then table order.
 */
export function applyLineRules(
  analyzer: AnalyzerName,
  rules: readonly LineRule[],
  file: FileDiff,
  lines: ChangedLineSet,
  config: ReviewConfig
): Finding[] {
  const findings: Finding[] = [];
  for (const line of lines) {
    findings.push(...matchLineRules(analyzer, rules, file, line, config));
  }
  return findings;
}

/**
 * Custom rules from the config file that target this analyzer and whose
 * scope glob matches the file. Patterns were validated when the config loaded.
 */
export function customRulesFor(
  analyzer: AnalyzerName,
  file: FileDiff,
  config: ReviewConfig
): LineRule[] {
  return config.customRules
    .filter((rule) => rule.analyzer === analyzer && minimatch(file.path, rule.scope))
    .map((rule) => ({
      id: rule.id,
      severity: rule.severity,
      message: rule.message ?? rule.description,
      pattern: new RegExp(rule.pattern),
    }));
}

export function isAllowlisted(
  path: string,
  ruleId: string,
  allowlist: readonly AllowlistEntry[]
): boolean {
  return allowlist.some((entry) => {
    if (!minimatch(path, entry.path)) return false;
    if (!entry.ruleIds || entry.ruleIds.length === 0) return true;
    return entry.ruleIds.includes(ruleId);
  });
}
