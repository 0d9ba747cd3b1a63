import * as core from "@actions/core";
import type { GitHub } from "@actions/github/lib/utils.js";
import { describeError } from "./errors.js";
import { normalizeStatus } from "./diff-parser.js";
import { BOT_SIGNATURE } from "./reviewer.js";
import type { PullRequestFile, RepoMetadata, Review } from "./types.js";

type Octokit = InstanceType<typeof GitHub>;

export interface ReviewComment {
  path: string;
  line: number;
  side: "RIGHT";
  body: string;
}

/**
 * Fetch every changed file of the pull request, following pagination.
 */
export async function listPullRequestFiles(
  octokit: Octokit,
  metadata: RepoMetadata
): Promise<PullRequestFile[]> {
  const files = await octokit.paginate(octokit.rest.pulls.listFiles, {
    owner: metadata.owner,
    repo: metadata.repo,
    pull_number: metadata.pullNumber,
    per_page: 100,
  });

  return files.map((file) => ({
    path: file.filename,
    status: normalizeStatus(file.status),
    patch: file.patch,
  }));
}

/**
 * Inline comments in the Review API's line-addressed shape. Lines refer to
 * the new file version, so every comment sits on the RIGHT side.
 */
export function toReviewComments(review: Review): ReviewComment[] {
  return review.inlineComments.map((comment) => ({
    path: comment.path,
    line: comment.line,
    side: "RIGHT",
    body: comment.body,
  }));
}

/**
 * Find a review Linegate posted on an earlier run of this PR.
 */
async function findExistingReview(
  octokit: Octokit,
  metadata: RepoMetadata
): Promise<{ id: number; state: string } | null> {
  const reviews = await octokit.paginate(octokit.rest.pulls.listReviews, {
    owner: metadata.owner,
    repo: metadata.repo,
    pull_number: metadata.pullNumber,
    per_page: 100,
  });

  for (const review of reviews) {
    if (review.body?.includes(BOT_SIGNATURE)) {
      return { id: review.id, state: review.state };
    }
  }
  return null;
}

/**
 * Post the review in a single API call. A blocking review left by a previous
 * run is dismissed first so it does not keep the PR blocked.
 */
export async function postReview(
  octokit: Octokit,
  metadata: RepoMetadata,
  review: Review
): Promise<void> {
  const existing = await findExistingReview(octokit, metadata);

  if (existing && existing.state === "CHANGES_REQUESTED") {
    core.info(`Dismissing previous Linegate review #${existing.id}`);
    try {
      await octokit.rest.pulls.dismissReview({
        owner: metadata.owner,
        repo: metadata.repo,
        pull_number: metadata.pullNumber,
        review_id: existing.id,
        message: "Superseded by an updated Linegate review",
      });
    } catch (err) {
      core.warning(`Could not dismiss previous review (may lack permissions): ${describeError(err)}`);
    }
  }

  core.info(`Posting review with ${review.inlineComments.length} inline comments`);

  await octokit.rest.pulls.createReview({
    owner: metadata.owner,
    repo: metadata.repo,
    pull_number: metadata.pullNumber,
    commit_id: metadata.headSha,
    body: review.summaryMarkdown,
    event: review.event,
    comments: toReviewComments(review),
  });

  core.info(`Review posted successfully (event: ${review.event})`);
}
