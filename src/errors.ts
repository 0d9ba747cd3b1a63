import type { AnalyzerName } from "./types.js";

export class LinegateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A patch that cannot be read as a unified diff. Scoped to one file. */
export class ParseError extends LinegateError {
  constructor(
    message: string,
    readonly lineIndex?: number
  ) {
    super(lineIndex === undefined ? message : `${message} (patch line ${lineIndex + 1})`);
  }
}

/** An analyzer threw while checking one file. */
export class AnalyzerError extends LinegateError {
  constructor(
    readonly analyzer: AnalyzerName,
    readonly file: string,
    readonly failure: unknown
  ) {
    super(`Analyzer "${analyzer}" failed on ${file}: ${describeError(failure)}`);
  }
}

/** Missing or invalid settings. Fatal to the whole run. */
export class ConfigError extends LinegateError {}

/**
 * Extract a log-safe message from an unknown thrown value.
 * Tokens that look like GitHub credentials are redacted.
 */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, "[REDACTED]")
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, "[REDACTED]")
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._-]+/gi, "$1 [REDACTED]");
}
