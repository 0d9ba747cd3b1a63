// Pull request input

export type FileStatus = "added" | "modified" | "removed" | "renamed";

export interface PullRequestFile {
  path: string;
  status: FileStatus;
  patch?: string;
}

// Diff parsing

export type DiffLineKind = "context" | "added" | "removed";

export interface DiffLine {
  readonly kind: DiffLineKind;
  readonly content: string;
  /** Line number in the new file version; absent for removed lines. */
  readonly newLineNumber?: number;
}

export interface Hunk {
  readonly header: string;
  readonly oldStart: number;
  readonly oldLines: number;
  readonly newStart: number;
  readonly newLines: number;
  readonly lines: readonly DiffLine[];
}

export interface ChangedLine {
  readonly lineNumber: number;
  readonly content: string;
}

/** Added lines of one file, ascending and unique by line number. */
export type ChangedLineSet = readonly ChangedLine[];

export interface FileDiff {
  readonly path: string;
  readonly status: FileStatus;
  readonly language: string;
  readonly hunks: readonly Hunk[];
  readonly changedLines: ChangedLineSet;
}

export interface ParseFailure {
  path: string;
  reason: string;
}

// Configuration

export type Severity = "error" | "warning" | "info";
export type AnalyzerName = "lint" | "security-pattern" | "complexity";
export type EnforcementMode = "warn" | "enforce";

export interface CustomRule {
  id: string;
  description: string;
  analyzer: Exclude<AnalyzerName, "complexity">;
  pattern: string;
  severity: Severity;
  scope: string;
  message?: string;
}

export interface AllowlistEntry {
  path: string;
  ruleIds?: string[];
  reason?: string;
}

export interface EnforcementSettings {
  mode: EnforcementMode;
  blockOn: Severity[];
}

export interface ReviewConfig {
  readonly maxLineLength: number;
  readonly maxInlineComments: number;
  readonly ignore: readonly string[];
  readonly customRules: readonly CustomRule[];
  readonly allowlist: readonly AllowlistEntry[];
  readonly enforcement: Readonly<EnforcementSettings>;
}

// Analysis and review output

export interface Finding {
  readonly analyzer: AnalyzerName;
  readonly ruleId: string;
  readonly severity: Severity;
  readonly file: string;
  readonly line: number;
  readonly message: string;
  readonly evidence?: string;
}

export type SeverityCounts = Record<Severity, number>;

export interface FileSummary extends SeverityCounts {
  readonly path: string;
}

export interface InlineComment {
  readonly path: string;
  readonly line: number;
  readonly message: string;
  readonly severity: Severity;
  readonly ruleId: string;
  readonly body: string;
}

export type ReviewEvent = "COMMENT" | "REQUEST_CHANGES";

export interface ReviewScope {
  filesAnalyzed: number;
  changedLinesAnalyzed: number;
  filesSkipped: number;
}

export interface Review {
  readonly pullRequestId: string;
  readonly summaryMarkdown: string;
  readonly severityCounts: Readonly<SeverityCounts>;
  readonly fileSummaries: readonly FileSummary[];
  readonly inlineComments: readonly InlineComment[];
  readonly totalFindings: number;
  readonly event: ReviewEvent;
}

export interface RepoMetadata {
  owner: string;
  repo: string;
  pullNumber: number;
  headSha: string;
}
