import type { ChangedLineSet, FileDiff, Finding, ReviewConfig } from "../types.js";
import { applyLineRules, customRulesFor, type Analyzer, type LineRule } from "./common.js";

const JS_LANGUAGES = ["javascript", "typescript"];

// Characters, not UTF-16 code units: an emoji counts once
function codePointLength(content: string): number {
  return [...content].length;
}

export const LINT_RULES: readonly LineRule[] = [
  {
    id: "lint-line-too-long",
    severity: "warning",
    when: (content, config) => codePointLength(content) > config.maxLineLength,
    message: (content, config) =>
      `Line length is ${codePointLength(content)} characters (limit: ${config.maxLineLength}).`,
  },
  {
    id: "lint-trailing-whitespace",
    severity: "info",
    pattern: /[ \t]$/,
    message: "Line has trailing whitespace.",
  },
  {
    id: "lint-todo-marker",
    severity: "info",
    pattern: /\b(?:TODO|FIXME|XXX)\b/,
    message: "TODO/FIXME marker found in changed line.",
  },
  {
    id: "lint-broad-except",
    severity: "warning",
    languages: ["python"],
    pattern: /^\s*except\s*(?:\(?\s*(?:Base)?Exception\s*\)?\s*)?(?:as\s+\w+\s*)?:/,
    message: "Bare or broad `except` hides unrelated failures; catch the specific exceptions you expect.",
  },
  {
    id: "lint-broad-catch",
    severity: "warning",
    languages: ["java", "kotlin", "csharp", "scala"],
    // catch (...) clauses, or a Scala `case e: Throwable =>` handler
    pattern:
      /\bcatch\s*\(\s*(?:final\s+)?(?:\w+\s*:\s*)?(?:java\.lang\.|System\.)?(?:Exception|Throwable)\b|\bcase\s+\w+\s*:\s*(?:java\.lang\.)?(?:Exception|Throwable)\s*=>/,
    message: "Catching `Exception`/`Throwable` hides unrelated failures; catch the specific exceptions you expect.",
  },
  {
    id: "lint-debug-print",
    severity: "warning",
    languages: ["python"],
    pattern: /^\s*print\s*\(/,
    message: "Debug print statement found in changed line.",
  },
  {
    id: "lint-debug-console",
    severity: "warning",
    languages: JS_LANGUAGES,
    pattern: /\bconsole\.(?:log|debug)\s*\(/,
    message: "Debug console.log statement found in changed line.",
  },
  {
    id: "lint-debugger",
    severity: "warning",
    languages: ["python", ...JS_LANGUAGES],
    pattern: /\bbreakpoint\(\)|\bpdb\.set_trace\(\)|^\s*debugger\s*;?\s*$/,
    message: "Debugger breakpoint left in changed line.",
  },
  {
    id: "lint-tab-indent",
    severity: "warning",
    languages: ["python"],
    pattern: /^[ \t]*\t/,
    message: "Tab character used for indentation in Python code.",
  },
];

export const lintAnalyzer: Analyzer = {
  name: "lint",
  appliesTo: () => true,
  analyze(file: FileDiff, lines: ChangedLineSet, config: ReviewConfig): Finding[] {
    const rules = [...LINT_RULES, ...customRulesFor("lint", file, config)];
    return applyLineRules("lint", rules, file, lines, config);
  },
};
