import * as core from "@actions/core";
import { runAnalyzers, DEFAULT_ANALYZERS } from "./analyzers/orchestrator.js";
import type { Analyzer } from "./analyzers/common.js";
import { validateReviewConfig, type ReviewSettings } from "./config.js";
import { parsePullRequestFiles } from "./diff-parser.js";
import { buildReview } from "./reviewer.js";
import type { FileDiff, Finding, ParseFailure, PullRequestFile, Review } from "./types.js";

export interface ReviewRequest {
  pullRequestId: string;
  files: readonly PullRequestFile[];
  settings: ReviewSettings;
  analyzers?: readonly Analyzer[];
}

export interface ReviewRun {
  review: Review;
  diffs: FileDiff[];
  parseFailures: ParseFailure[];
  ignored: string[];
}

/**
 * Turn one pull request's file patches into its Review:
 * parse, analyze the changed lines of each file, aggregate.
 *
 * Invalid settings throw ConfigError before any patch is parsed. Unparseable
 * files and failing analyzers are logged and left out; they never stop the review.
 */
export function reviewPullRequest(request: ReviewRequest): ReviewRun {
  const config = validateReviewConfig(request.settings);

  const { diffs, failures, ignored } = parsePullRequestFiles(request.files, config.ignore);
  for (const failure of failures) {
    core.warning(`Skipping ${failure.path}: ${failure.reason}`);
  }
  if (ignored.length > 0) {
    core.info(`Ignored ${ignored.length} non-reviewable file(s)`);
  }

  const findings: Finding[] = [];
  for (const diff of diffs) {
    const fileFindings = runAnalyzers(diff, config, request.analyzers ?? DEFAULT_ANALYZERS);
    core.debug(`${diff.path}: ${diff.changedLines.length} changed line(s), ${fileFindings.length} finding(s)`);
    findings.push(...fileFindings);
  }

  const review = buildReview({
    pullRequestId: request.pullRequestId,
    findings,
    maxInlineComments: config.maxInlineComments,
    scope: {
      filesAnalyzed: diffs.length,
      changedLinesAnalyzed: diffs.reduce((sum, diff) => sum + diff.changedLines.length, 0),
      filesSkipped: failures.length,
    },
    enforcement: config.enforcement,
  });

  return { review, diffs, parseFailures: failures, ignored };
}
