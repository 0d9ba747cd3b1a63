import { describe, it, expect } from "vitest";
import {
  changedLines,
  detectLanguage,
  parseHunks,
  parsePullRequestFiles,
  shouldIgnoreFile,
} from "../src/diff-parser.js";
import { ParseError } from "../src/errors.js";

describe("parseHunks", () => {
  it("parses a single hunk", () => {
    const patch = `@@ -1,4 +1,5 @@
 line1
 line2
+added line
 line3
 line4`;

    const hunks = parseHunks(patch);
    expect(hunks).toHaveLength(1);
    expect(hunks[0].oldStart).toBe(1);
    expect(hunks[0].oldLines).toBe(4);
    expect(hunks[0].newStart).toBe(1);
    expect(hunks[0].newLines).toBe(5);
  });

  it("classifies lines and numbers them in the new file", () => {
    const patch = `@@ -5,4 +5,5 @@
 context
-removed line
+added line 1
+added line 2
 context
 context`;

    const [hunk] = parseHunks(patch);
    expect(hunk.lines.map((l) => l.kind)).toEqual([
      "context",
      "removed",
      "added",
      "added",
      "context",
      "context",
    ]);
    expect(hunk.lines.map((l) => l.newLineNumber)).toEqual([5, undefined, 6, 7, 8, 9]);
    expect(hunk.lines[1].content).toBe("removed line");
  });

  it("parses multiple hunks", () => {
    const patch = `@@ -1,3 +1,4 @@
 line1
+added1
 line2
 line3
@@ -10,3 +11,4 @@
 line10
+added2
 line11
 line12`;

    const hunks = parseHunks(patch);
    expect(hunks).toHaveLength(2);
    expect(hunks[0].newStart).toBe(1);
    expect(hunks[1].newStart).toBe(11);
  });

  it("handles hunks with no line count (single line)", () => {
    const patch = `@@ -1 +1 @@
-old
+new`;

    const hunks = parseHunks(patch);
    expect(hunks).toHaveLength(1);
    expect(hunks[0].oldLines).toBe(1);
    expect(hunks[0].newLines).toBe(1);
  });

  it("returns empty array for empty patch", () => {
    expect(parseHunks("")).toEqual([]);
  });

  it("rejects a malformed hunk header", () => {
    expect(() => parseHunks("@@ -a,b +c @@\n+x")).toThrow(ParseError);
    expect(() => parseHunks("@@ garbage\n+x")).toThrow("Malformed hunk header: @@ garbage (patch line 1)");
  });

  it("rejects a hunk holding more lines than its header declares", () => {
    expect(() => parseHunks("@@ -1,1 +1,1 @@\n-a\n+b\n+c")).toThrow(ParseError);
  });

  it("rejects a hunk that starts before the previous one ended", () => {
    const patch = "@@ -1,2 +1,2 @@\n a\n b\n@@ -2,1 +2,1 @@\n b";
    expect(() => parseHunks(patch)).toThrow(
      "Hunk starts at new line 2, before line 3 reached by the previous hunk (patch line 4)"
    );
  });
});

describe("changedLines", () => {
  it("keeps only added lines, numbered from the hunk's new start", () => {
    const patch = "@@ -1,2 +1,3 @@\n context\n+import os\n+eval(x)\n";

    expect(changedLines(patch)).toEqual([
      { lineNumber: 2, content: "import os" },
      { lineNumber: 3, content: "eval(x)" },
    ]);
  });

  it("numbers added lines across several hunks", () => {
    const patch = `@@ -1,3 +1,4 @@
 line1
+added1
 line2
 line3
@@ -10,3 +11,4 @@
 line10
+added2
 line11
 line12`;

    expect(changedLines(patch)).toEqual([
      { lineNumber: 2, content: "added1" },
      { lineNumber: 12, content: "added2" },
    ]);
  });

  it("does not advance the new-file counter on removed lines", () => {
    const patch = "@@ -5,4 +5,5 @@\n context\n-removed line\n+added line 1\n+added line 2\n context\n context";

    expect(changedLines(patch).map((l) => l.lineNumber)).toEqual([6, 7]);
  });

  it("skips the file header before the first hunk", () => {
    const patch = `diff --git a/app.py b/app.py
index 83db48f..bf269f4 100644
--- a/app.py
+++ b/app.py
@@ -1,1 +1,2 @@
 import sys
+import os`;

    expect(changedLines(patch)).toEqual([{ lineNumber: 2, content: "import os" }]);
  });

  it("ignores no-newline markers", () => {
    const patch = "@@ -1,1 +1,1 @@\n-old\n\\ No newline at end of file\n+new\n\\ No newline at end of file";

    expect(changedLines(patch)).toEqual([{ lineNumber: 1, content: "new" }]);
  });

  it("treats a blank line inside a hunk as context", () => {
    const patch = "@@ -1,3 +1,4 @@\n a\n\n+b\n c";

    expect(changedLines(patch)).toEqual([{ lineNumber: 3, content: "b" }]);
  });

  it("ends a hunk at a blank line its header has no room for", () => {
    const patch = "@@ -1,2 +1,3 @@\n context\n+import os\n+eval(x)\n\n";

    expect(changedLines(patch)).toEqual([
      { lineNumber: 2, content: "import os" },
      { lineNumber: 3, content: "eval(x)" },
    ]);
    expect(parsePullRequestFiles([{ path: "a.py", status: "modified", patch }]).failures).toEqual([]);
  });

  it("returns an empty set for empty, binary and deletion-only patches", () => {
    expect(changedLines("")).toEqual([]);
    expect(changedLines("Binary files a/logo.png and b/logo.png differ")).toEqual([]);
    expect(changedLines("@@ -3,2 +2,0 @@\n-a\n-b")).toEqual([]);
  });

  it("is idempotent and strictly ascending", () => {
    const patch = "@@ -1,3 +1,6 @@\n a\n+b\n+c\n d\n+e\n f";
    const first = changedLines(patch);
    const second = changedLines(patch);

    expect(second).toEqual(first);
    for (let i = 1; i < first.length; i++) {
      expect(first[i].lineNumber).toBeGreaterThan(first[i - 1].lineNumber);
    }
  });
});

describe("detectLanguage", () => {
  it("maps known extensions", () => {
    expect(detectLanguage("src/app.py")).toBe("python");
    expect(detectLanguage("web/App.TSX")).toBe("typescript");
    expect(detectLanguage("cmd/main.go")).toBe("go");
  });

  it("falls back to text", () => {
    expect(detectLanguage("Makefile")).toBe("text");
    expect(detectLanguage(".bashrc")).toBe("text");
    expect(detectLanguage("docs/notes.md")).toBe("text");
  });
});

describe("shouldIgnoreFile", () => {
  it("ignores lock files", () => {
    expect(shouldIgnoreFile("package-lock.json")).toBe(true);
    expect(shouldIgnoreFile("yarn.lock")).toBe(true);
    expect(shouldIgnoreFile("pnpm-lock.yaml")).toBe(true);
  });

  it("ignores image and minified files", () => {
    expect(shouldIgnoreFile("assets/logo.png")).toBe(true);
    expect(shouldIgnoreFile("dist/bundle.min.js")).toBe(true);
  });

  it("does not ignore source files", () => {
    expect(shouldIgnoreFile("src/index.ts")).toBe(false);
    expect(shouldIgnoreFile("app/services/auth.py")).toBe(false);
  });

  it("respects extra ignore patterns", () => {
    expect(shouldIgnoreFile("src/generated/types.ts", ["**/generated/**"])).toBe(true);
    expect(shouldIgnoreFile("src/index.ts", ["**/generated/**"])).toBe(false);
  });
});

describe("parsePullRequestFiles", () => {
  it("parses, ignores and isolates unparseable files", () => {
    const result = parsePullRequestFiles([
      { path: "src/app.py", status: "modified", patch: "@@ -1,1 +1,2 @@\n import sys\n+import os" },
      { path: "assets/logo.png", status: "added" },
      { path: "package-lock.json", status: "modified", patch: "@@ -1 +1 @@\n-a\n+b" },
      { path: "src/broken.py", status: "modified", patch: "@@ -x +y @@\n+a" },
      { path: "docs/guide.md", status: "renamed" },
    ]);

    expect(result.diffs.map((d) => d.path)).toEqual(["src/app.py", "docs/guide.md"]);
    expect(result.diffs[0].language).toBe("python");
    expect(result.diffs[0].changedLines).toEqual([{ lineNumber: 2, content: "import os" }]);
    expect(result.diffs[1].changedLines).toEqual([]);
    expect(result.ignored).toEqual(["assets/logo.png", "package-lock.json"]);
    expect(result.failures).toEqual([
      { path: "src/broken.py", reason: "Malformed hunk header: @@ -x +y @@ (patch line 1)" },
    ]);
  });
});
