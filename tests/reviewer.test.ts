import { describe, it, expect } from "vitest";
import { buildReview, BOT_SIGNATURE, MAX_TABLE_ROWS } from "../src/reviewer.js";
import { ConfigError } from "../src/errors.js";
import { makeFinding } from "./helpers.js";

const evalFinding = makeFinding({
  analyzer: "security-pattern",
  ruleId: "security-eval",
  severity: "error",
  file: "a.py",
  line: 3,
  message: "Avoid eval.",
  evidence: "eval(x)",
});

describe("buildReview", () => {
  it("reports a clean run", () => {
    const review = buildReview({
      pullRequestId: "acme/app#1",
      findings: [],
      maxInlineComments: 5,
      scope: { filesAnalyzed: 1, changedLinesAnalyzed: 0, filesSkipped: 0 },
    });

    expect(review.summaryMarkdown).toBe(
      "<!-- linegate-review -->\n## Linegate Review\n\n" +
        "### Scope\n- Files analyzed: 1\n- Changed lines analyzed: 0\n\n" +
        "### Result\n✅ No issues found on changed lines.\n"
    );
    expect(review.severityCounts).toEqual({ error: 0, warning: 0, info: 0 });
    expect(review.fileSummaries).toEqual([]);
    expect(review.inlineComments).toEqual([]);
    expect(review.totalFindings).toBe(0);
    expect(review.event).toBe("COMMENT");
  });

  it("renders the breakdown, file table and findings table", () => {
    const review = buildReview({ pullRequestId: "acme/app#1", findings: [evalFinding], maxInlineComments: 5 });

    expect(review.summaryMarkdown).toBe(
      `${BOT_SIGNATURE}\n## Linegate Review\n\n` +
        "### Severity Breakdown\nFindings: 1\n\n" +
        "| Severity | Count |\n| --- | ---: |\n" +
        "| 🔴 Error | 1 |\n| 🟡 Warning | 0 |\n| 🔵 Info | 0 |\n" +
        "\n### Files\n| File | Error | Warning | Info |\n| --- | ---: | ---: | ---: |\n" +
        "| `a.py` | 1 | 0 | 0 |\n" +
        "\n### Findings (Changed Lines Only)\n| File | Line | Severity | Rule | Message |\n| --- | ---: | --- | --- | --- |\n" +
        "| `a.py` | 3 | ERROR | `security-eval` | Avoid eval. |\n"
    );
  });

  it("formats inline comment bodies", () => {
    const review = buildReview({ pullRequestId: "acme/app#1", findings: [evalFinding], maxInlineComments: 5 });

    expect(review.inlineComments).toEqual([
      {
        path: "a.py",
        line: 3,
        message: "Avoid eval.",
        severity: "error",
        ruleId: "security-eval",
        body:
          "🔴 **Error:** Avoid eval.\n\n```\neval(x)\n```\n\n" +
          "<sub>Rule: `security-eval` | Analyzer: security-pattern</sub>",
      },
    ]);
  });

  it("omits the code block when a finding has no evidence", () => {
    const review = buildReview({
      pullRequestId: "acme/app#1",
      findings: [makeFinding({ ruleId: "lint-todo-marker", severity: "info", file: "b.ts", line: 1, message: "TODO." })],
      maxInlineComments: 1,
    });

    expect(review.inlineComments[0].body).toBe(
      "🔵 **Info:** TODO.\n\n<sub>Rule: `lint-todo-marker` | Analyzer: lint</sub>"
    );
  });

  it("caps inline comments to the highest-ranked findings but counts everything", () => {
    const findings = [
      makeFinding({ severity: "info", file: "a.py", line: 1 }),
      makeFinding({ severity: "warning", file: "a.py", line: 2 }),
      makeFinding({ severity: "error", file: "a.py", line: 3 }),
    ];

    const capped = buildReview({ pullRequestId: "acme/app#1", findings, maxInlineComments: 2 });
    expect(capped.inlineComments.map((c) => c.severity)).toEqual(["error", "warning"]);
    expect(capped.severityCounts).toEqual({ error: 1, warning: 1, info: 1 });
    expect(capped.totalFindings).toBe(3);

    const none = buildReview({ pullRequestId: "acme/app#1", findings, maxInlineComments: 0 });
    expect(none.inlineComments).toEqual([]);
    expect(none.summaryMarkdown).toContain(
      "_Inline comments limited to 0 of 3 findings (max-inline-comments: 0)._"
    );
  });

  it("truncates the findings table", () => {
    const findings = Array.from({ length: MAX_TABLE_ROWS + 1 }, (_, idx) =>
      makeFinding({ severity: "warning", file: "a.py", line: idx + 1 })
    );

    const review = buildReview({ pullRequestId: "acme/app#1", findings, maxInlineComments: 50 });

    expect(review.summaryMarkdown).toContain(
      "_Table truncated to first 40 findings; 1 more are included in the counts above._"
    );
    expect(review.summaryMarkdown).toContain("| `a.py` | 40 | WARNING |");
    expect(review.summaryMarkdown).not.toContain("| `a.py` | 41 | WARNING |");
    expect(review.inlineComments).toHaveLength(41);
  });

  it("escapes table cells", () => {
    const review = buildReview({
      pullRequestId: "acme/app#1",
      findings: [makeFinding({ severity: "warning", file: "a.py", line: 1, message: "a | b\nc" })],
      maxInlineComments: 0,
    });

    expect(review.summaryMarkdown).toContain("| a \\| b c |\n");
  });

  it("requests changes only in enforce mode on a blocking severity", () => {
    const warn = buildReview({
      pullRequestId: "acme/app#1",
      findings: [evalFinding],
      maxInlineComments: 5,
      enforcement: { mode: "warn", blockOn: ["error"] },
    });
    const enforced = buildReview({
      pullRequestId: "acme/app#1",
      findings: [evalFinding],
      maxInlineComments: 5,
      enforcement: { mode: "enforce", blockOn: ["error"] },
    });
    const nonBlocking = buildReview({
      pullRequestId: "acme/app#1",
      findings: [makeFinding({ severity: "info", file: "a.py", line: 1 })],
      maxInlineComments: 5,
      enforcement: { mode: "enforce", blockOn: ["error"] },
    });

    expect(warn.event).toBe("COMMENT");
    expect(enforced.event).toBe("REQUEST_CHANGES");
    expect(nonBlocking.event).toBe("COMMENT");
  });

  it("rejects an invalid inline cap", () => {
    expect(() => buildReview({ pullRequestId: "x", findings: [], maxInlineComments: -1 })).toThrow(ConfigError);
    expect(() => buildReview({ pullRequestId: "x", findings: [], maxInlineComments: 1.5 })).toThrow(
      "maxInlineComments must be a non-negative integer (got 1.5)"
    );
  });

  it("returns an immutable review", () => {
    const review = buildReview({ pullRequestId: "acme/app#1", findings: [evalFinding], maxInlineComments: 5 });

    expect(Object.isFrozen(review)).toBe(true);
    expect(Object.isFrozen(review.inlineComments)).toBe(true);
    expect(Object.isFrozen(review.inlineComments[0])).toBe(true);
    expect(Object.isFrozen(review.severityCounts)).toBe(true);
  });
});
