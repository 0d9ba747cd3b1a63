import type { ChangedLineSet, FileDiff, Finding, ReviewConfig } from "../types.js";
import { applyLineRules, customRulesFor, type Analyzer, type LineRule } from "./common.js";

const JS_LANGUAGES = ["javascript", "typescript"];

export const SECURITY_RULES: readonly LineRule[] = [
  {
    id: "security-eval",
    severity: "error",
    pattern: /(?<![\w.$])eval\s*\(/,
    message: "Avoid `eval()` on changed lines; it executes arbitrary code. Use a safe parser instead.",
  },
  {
    id: "security-exec",
    severity: "error",
    languages: ["python"],
    pattern: /(?<![\w.])exec\s*\(/,
    message: "Avoid `exec()` on changed lines; it executes arbitrary code.",
  },
  {
    id: "security-function-constructor",
    severity: "error",
    languages: JS_LANGUAGES,
    pattern: /\bnew\s+Function\s*\(/,
    message: "`new Function()` compiles strings into code, like `eval()`.",
  },
  {
    id: "security-subprocess-shell",
    severity: "error",
    languages: ["python"],
    pattern: /\bsubprocess\.\w+\(.*shell\s*=\s*True/,
    message: "subprocess with shell=True on changed line may enable command injection.",
  },
  {
    id: "security-shell-injection",
    severity: "error",
    languages: ["python"],
    pattern: /\b(?:os\.(?:system|popen)|subprocess\.\w+)\s*\(\s*(?:f["']|[^)]*["']\s*\+|[^)]*\+\s*["']|[^)]*["']\s*%|[^)]*\.format\()/,
    message: "Command string built by concatenation or interpolation; pass arguments as a list instead.",
  },
  {
    id: "security-shell-concat",
    severity: "error",
    languages: JS_LANGUAGES,
    pattern: /\b(?:exec|execSync|spawn|spawnSync)\s*\(\s*(?:`[^`]*\$\{|[^)]*["'`]\s*\+|[^)]*\+\s*["'`])/,
    message: "Command string built by concatenation or interpolation; use execFile/spawn with an argument array.",
  },
  {
    id: "security-os-system",
    severity: "warning",
    languages: ["python"],
    pattern: /\bos\.(?:system|popen)\s*\(/,
    message: "`os.system`/`os.popen` run through the shell; prefer subprocess with an argument list.",
  },
  {
    id: "security-pickle-load",
    severity: "error",
    languages: ["python"],
    pattern: /\b(?:c?[Pp]ickle|dill)\.loads?\s*\(/,
    message: "pickle.loads/load can execute arbitrary code on untrusted input.",
  },
  {
    id: "security-marshal-load",
    severity: "error",
    languages: ["python"],
    pattern: /\bmarshal\.loads?\s*\(/,
    message: "marshal is not safe against untrusted input.",
  },
  {
    id: "security-yaml-load",
    severity: "warning",
    languages: ["python"],
    pattern: /\byaml\.load\s*\(/,
    unless: /safe_load|SafeLoader/,
    message: "Use yaml.safe_load instead of yaml.load.",
  },
  {
    id: "security-hardcoded-secret",
    severity: "error",
    pattern: /(?:api[_-]?key|secret|token|password)\s*[:=]\s*["'][^"']{8,}["']/i,
    message: "Possible hardcoded secret; load it from runtime configuration or a secret manager.",
  },
  {
    id: "security-aws-access-key",
    severity: "error",
    pattern: /\bAKIA[0-9A-Z]{16}\b/,
    message: "AWS-style access key detected.",
  },
  {
    id: "security-private-key",
    severity: "error",
    pattern: /-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+|DSA\s+)?PRIVATE\s+KEY-----/,
    message: "Private key material detected.",
  },
];

export const securityPatternAnalyzer: Analyzer = {
  name: "security-pattern",
  appliesTo: (file) => file.language !== "text",
  analyze(file: FileDiff, lines: ChangedLineSet, config: ReviewConfig): Finding[] {
    const rules = [...SECURITY_RULES, ...customRulesFor("security-pattern", file, config)];
    return applyLineRules("security-pattern", rules, file, lines, config);
  },
};
