import * as core from "@actions/core";
import * as github from "@actions/github";
import { loadConfig, resolveSettings, validateReviewConfig } from "./config.js";
import { describeError } from "./errors.js";
import { listPullRequestFiles, postReview } from "./github.js";
import { reviewPullRequest } from "./pipeline.js";
import type { RepoMetadata } from "./types.js";

const SUPPORTED_ACTIONS = new Set(["opened", "reopened", "synchronize", "ready_for_review"]);

async function run(): Promise<void> {
  try {
    // ── Token and event filtering ────────────────────────────────
    const configPath = core.getInput("config-path") || ".linegate.yml";
    const token = core.getInput("github-token") || process.env.GITHUB_TOKEN;
    if (!token) {
      core.setFailed("GitHub token is required. Set GITHUB_TOKEN or pass github-token input.");
      return;
    }

    const context = github.context;
    const eventName = context.eventName;
    const action = context.payload.action;

    if (
      (eventName !== "pull_request" && eventName !== "pull_request_target") ||
      !action ||
      !SUPPORTED_ACTIONS.has(action)
    ) {
      core.info(`Unsupported event: ${eventName}.${action ?? ""}, skipping`);
      return;
    }

    const pr = context.payload.pull_request;
    if (!pr) {
      core.setFailed("No pull request found in event payload");
      return;
    }
    if (pr.draft === true) {
      core.info(`PR #${pr.number} is a draft, skipping`);
      return;
    }

    const headSha: unknown = pr.head?.sha;
    if (typeof headSha !== "string" || !headSha) {
      core.setFailed("Pull request payload has no head commit SHA");
      return;
    }

    // ── Settings (fatal when invalid, before anything is fetched) ──
    const settings = resolveSettings(loadConfig(configPath), {
      maxLineLength: core.getInput("max-line-length"),
      maxInlineComments: core.getInput("max-inline-comments"),
      mode: core.getInput("mode"),
    });
    const config = validateReviewConfig(settings);
    core.info(
      `Settings: max line length ${config.maxLineLength}, max inline comments ${config.maxInlineComments}, mode ${config.enforcement.mode}`
    );

    const metadata: RepoMetadata = {
      owner: context.repo.owner,
      repo: context.repo.repo,
      pullNumber: pr.number,
      headSha,
    };
    core.info(`Reviewing PR #${metadata.pullNumber} (${headSha})`);

    // ── Fetch, analyze and post ──────────────────────────────────
    const octokit = github.getOctokit(token);
    const files = await listPullRequestFiles(octokit, metadata);
    core.info(`Fetched ${files.length} changed file(s)`);

    const { review, diffs, parseFailures } = reviewPullRequest({
      pullRequestId: `${metadata.owner}/${metadata.repo}#${metadata.pullNumber}`,
      files,
      settings: config,
    });
    core.info(
      `Analyzed ${diffs.length} file(s): ${review.totalFindings} finding(s), ${parseFailures.length} skipped`
    );

    await postReview(octokit, metadata, review);

    // ── Outputs ──────────────────────────────────────────────────
    core.setOutput("findings-count", review.totalFindings.toString());
    core.setOutput("inline-comments", review.inlineComments.length.toString());
    core.setOutput("review-event", review.event);
    core.setOutput("files-skipped", parseFailures.length.toString());

    if (review.event === "REQUEST_CHANGES") {
      core.setFailed(
        `Linegate found blocking issues (${review.severityCounts.error} error, ${review.severityCounts.warning} warning)`
      );
    }
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

void run();
