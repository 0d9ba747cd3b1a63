import { ConfigError } from "./errors.js";
import {
  countBySeverity,
  rankFindings,
  SEVERITIES,
  summarizeByFile,
} from "./analyzers/review-synthesizer.js";
import type {
  EnforcementSettings,
  FileSummary,
  Finding,
  InlineComment,
  Review,
  ReviewEvent,
  ReviewScope,
  Severity,
  SeverityCounts,
} from "./types.js";

const SEVERITY_EMOJI: Record<Severity, string> = {
  error: "🔴",
  warning: "🟡",
  info: "🔵",
};

const SEVERITY_LABEL: Record<Severity, string> = {
  error: "Error",
  warning: "Warning",
  info: "Info",
};

export const BOT_SIGNATURE = "<!-- linegate-review -->";

/** Rows of the findings table in the summary; the counts always cover everything. */
export const MAX_TABLE_ROWS = 40;

export interface BuildReviewInput {
  pullRequestId: string;
  findings: readonly Finding[];
  maxInlineComments: number;
  scope?: ReviewScope;
  enforcement?: Readonly<EnforcementSettings>;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Format a finding into a markdown inline comment body.
 */
function formatInlineComment(finding: Finding): string {
  let body = `${SEVERITY_EMOJI[finding.severity]} **${SEVERITY_LABEL[finding.severity]}:** ${finding.message}`;
  if (finding.evidence) {
    body += `\n\n\`\`\`\n${finding.evidence}\n\`\`\``;
  }
  body += `\n\n<sub>Rule: \`${finding.ruleId}\` | Analyzer: ${finding.analyzer}</sub>`;
  return body;
}

function formatScope(scope: ReviewScope): string {
  let body = `### Scope\n`;
  body += `- Files analyzed: ${scope.filesAnalyzed}\n`;
  body += `- Changed lines analyzed: ${scope.changedLinesAnalyzed}\n`;
  if (scope.filesSkipped > 0) {
    body += `- Files skipped (unparseable diff): ${scope.filesSkipped}\n`;
  }
  return `${body}\n`;
}

/**
 * Build the summary review body: severity breakdown, per-file table and
 * the top-ranked findings.
 */
function formatSummaryBody(
  ranked: readonly Finding[],
  counts: SeverityCounts,
  fileSummaries: readonly FileSummary[],
  inlineCount: number,
  maxInlineComments: number,
  scope?: ReviewScope
): string {
  let body = `${BOT_SIGNATURE}\n## Linegate Review\n\n`;
  if (scope) body += formatScope(scope);

  if (ranked.length === 0) {
    body += `### Result\n✅ No issues found on changed lines.\n`;
    return body;
  }

  body += `### Severity Breakdown\n`;
  body += `Findings: ${ranked.length}\n\n`;
  body += `| Severity | Count |\n| --- | ---: |\n`;
  for (const severity of SEVERITIES) {
    body += `| ${SEVERITY_EMOJI[severity]} ${SEVERITY_LABEL[severity]} | ${counts[severity]} |\n`;
  }

  body += `\n### Files\n`;
  body += `| File | Error | Warning | Info |\n| --- | ---: | ---: | ---: |\n`;
  for (const row of fileSummaries) {
    body += `| \`${escapeCell(row.path)}\` | ${row.error} | ${row.warning} | ${row.info} |\n`;
  }

  body += `\n### Findings (Changed Lines Only)\n`;
  body += `| File | Line | Severity | Rule | Message |\n| --- | ---: | --- | --- | --- |\n`;
  for (const finding of ranked.slice(0, MAX_TABLE_ROWS)) {
    body += `| \`${escapeCell(finding.file)}\` | ${finding.line} | ${finding.severity.toUpperCase()} | \`${escapeCell(finding.ruleId)}\` | ${escapeCell(finding.message)} |\n`;
  }

  if (ranked.length > MAX_TABLE_ROWS) {
    body += `\n_Table truncated to first ${MAX_TABLE_ROWS} findings; ${ranked.length - MAX_TABLE_ROWS} more are included in the counts above._\n`;
  }

  if (inlineCount < ranked.length) {
    body += `\n_Inline comments limited to ${inlineCount} of ${ranked.length} findings (max-inline-comments: ${maxInlineComments})._\n`;
  }

  return body;
}

function decideEvent(
  findings: readonly Finding[],
  enforcement?: Readonly<EnforcementSettings>
): ReviewEvent {
  if (!enforcement || enforcement.mode !== "enforce") return "COMMENT";
  const blocking = findings.some((f) => enforcement.blockOn.includes(f.severity));
  return blocking ? "REQUEST_CHANGES" : "COMMENT";
}

/**
 * Aggregate every finding of a run into the single Review that gets posted.
 * All findings are counted; only the top `maxInlineComments` become inline comments.
 */
export function buildReview(input: BuildReviewInput): Review {
  const { maxInlineComments } = input;
  if (!Number.isInteger(maxInlineComments) || maxInlineComments < 0) {
    throw new ConfigError(
      `maxInlineComments must be a non-negative integer (got ${String(maxInlineComments)})`
    );
  }

  const ranked = rankFindings(input.findings);
  const severityCounts = countBySeverity(ranked);
  const fileSummaries = summarizeByFile(ranked);

  const inlineComments: InlineComment[] = ranked.slice(0, maxInlineComments).map((finding) =>
    Object.freeze({
      path: finding.file,
      line: finding.line,
      message: finding.message,
      severity: finding.severity,
      ruleId: finding.ruleId,
      body: formatInlineComment(finding),
    })
  );

  return Object.freeze({
    pullRequestId: input.pullRequestId,
    summaryMarkdown: formatSummaryBody(
      ranked,
      severityCounts,
      fileSummaries,
      inlineComments.length,
      maxInlineComments,
      input.scope
    ),
    severityCounts: Object.freeze(severityCounts),
    fileSummaries: Object.freeze(fileSummaries),
    inlineComments: Object.freeze(inlineComments),
    totalFindings: ranked.length,
    event: decideEvent(ranked, input.enforcement),
  });
}
