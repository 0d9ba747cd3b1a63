import { minimatch } from "minimatch";
import { ParseError } from "./errors.js";
import type {
  ChangedLine,
  ChangedLineSet,
  DiffLine,
  FileDiff,
  FileStatus,
  Hunk,
  ParseFailure,
  PullRequestFile,
} from "./types.js";

// Files that should never be reviewed
const DEFAULT_IGNORE_PATTERNS = [
  "package-lock.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "**/*.min.js",
  "**/*.min.css",
  "**/*.map",
  "**/*.png",
  "**/*.jpg",
  "**/*.gif",
  "**/*.ico",
  "**/*.woff",
  "**/*.woff2",
  "**/*.ttf",
  "**/*.eot",
  "**/*.svg",
  "**/*.pdf",
];

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  c: "c",
  cc: "cpp",
  cpp: "cpp",
  cs: "csharp",
  go: "go",
  java: "java",
  js: "javascript",
  jsx: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  kt: "kotlin",
  php: "php",
  py: "python",
  rb: "ruby",
  rs: "rust",
  scala: "scala",
  sh: "shell",
  sql: "sql",
  swift: "swift",
  ts: "typescript",
  tsx: "typescript",
  mts: "typescript",
  cts: "typescript",
};

const HUNK_HEADER_REGEX = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

// Lines git writes between hunks when several files share one patch
const FILE_HEADER_PREFIXES = [
  "diff --git ",
  "index ",
  "--- ",
  "+++ ",
  "new file mode",
  "deleted file mode",
  "old mode",
  "new mode",
  "similarity index",
  "rename from",
  "rename to",
  "Binary files ",
];

interface HunkBuilder {
  header: string;
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: DiffLine[];
  oldSeen: number;
  newSeen: number;
}

/**
 * Map a file path to the language its extension denotes, or "text".
 */
export function detectLanguage(path: string): string {
  const name = path.slice(path.lastIndexOf("/") + 1).toLowerCase();
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return "text";
  return LANGUAGE_BY_EXTENSION[name.slice(dot + 1)] ?? "text";
}

function splitPatchLines(patch: string): string[] {
  const lines = patch.split(/\r?\n/);
  // A trailing newline terminates the last line; it does not open a new one
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function isComplete(hunk: HunkBuilder): boolean {
  return hunk.oldSeen >= hunk.oldLines && hunk.newSeen >= hunk.newLines;
}

function freezeHunk(hunk: HunkBuilder): Hunk {
  return Object.freeze({
    header: hunk.header,
    oldStart: hunk.oldStart,
    oldLines: hunk.oldLines,
    newStart: hunk.newStart,
    newLines: hunk.newLines,
    lines: Object.freeze(hunk.lines.map((line) => Object.freeze(line))),
  });
}

function classifyLine(hunk: HunkBuilder, line: string): DiffLine {
  if (line.startsWith("+")) {
    const diffLine: DiffLine = {
      kind: "added",
      content: line.slice(1),
      newLineNumber: hunk.newStart + hunk.newSeen,
    };
    hunk.newSeen++;
    return diffLine;
  }

  if (line.startsWith("-")) {
    hunk.oldSeen++;
    return { kind: "removed", content: line.slice(1) };
  }

  // Context line: both sides advance. Some tools drop the leading space of blank lines.
  const diffLine: DiffLine = {
    kind: "context",
    content: line.startsWith(" ") ? line.slice(1) : line,
    newLineNumber: hunk.newStart + hunk.newSeen,
  };
  hunk.newSeen++;
  hunk.oldSeen++;
  return diffLine;
}

/**
 * Parse a unified diff patch string into structured Hunk objects.
 * Handles the `@@ -oldStart,oldLines +newStart,newLines @@` header format,
 * where either count may be omitted and defaults to 1.
 *
 * Throws ParseError on a malformed hunk header or inconsistent line numbering.
 */
export function parseHunks(patch: string): Hunk[] {
  const hunks: Hunk[] = [];
  const lines = splitPatchLines(patch);

  let current: HunkBuilder | null = null;
  let nextNewLine = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (line.startsWith("@@")) {
      const match = HUNK_HEADER_REGEX.exec(line);
      if (!match) {
        throw new ParseError(`Malformed hunk header: ${line}`, i);
      }
      if (current) {
        hunks.push(freezeHunk(current));
        nextNewLine = current.newStart + current.newSeen;
      }

      const newStart = parseInt(match[3], 10);
      if (newStart < nextNewLine) {
        throw new ParseError(
          `Hunk starts at new line ${newStart}, before line ${nextNewLine} reached by the previous hunk`,
          i
        );
      }

      current = {
        header: line,
        oldStart: parseInt(match[1], 10),
        oldLines: match[2] !== undefined ? parseInt(match[2], 10) : 1,
        newStart,
        newLines: match[4] !== undefined ? parseInt(match[4], 10) : 1,
        lines: [],
        oldSeen: 0,
        newSeen: 0,
      };
      continue;
    }

    // File header lines before the first hunk
    if (!current) continue;

    // "\ No newline at end of file"
    if (line.startsWith("\\")) continue;

    // A blank line the header leaves no room for ends the hunk instead of overflowing it
    const blankAfterEnd =
      line === "" && (current.newSeen >= current.newLines || current.oldSeen >= current.oldLines);

    if (blankAfterEnd || isComplete(current)) {
      if (blankAfterEnd || FILE_HEADER_PREFIXES.some((prefix) => line.startsWith(prefix))) {
        hunks.push(freezeHunk(current));
        nextNewLine = current.newStart + current.newSeen;
        current = null;
        continue;
      }
      throw new ParseError(`Hunk "${current.header}" holds more lines than its header declares`, i);
    }

    current.lines.push(classifyLine(current, line));

    if (current.newSeen > current.newLines || current.oldSeen > current.oldLines) {
      throw new ParseError(`Hunk "${current.header}" holds more lines than its header declares`, i);
    }
  }

  if (current) hunks.push(freezeHunk(current));
  return hunks;
}

/**
 * Collect the added lines of parsed hunks, ascending and unique by line number.
 */
export function collectChangedLines(hunks: readonly Hunk[]): ChangedLineSet {
  const seen = new Set<number>();
  const changed: ChangedLine[] = [];

  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.kind !== "added" || line.newLineNumber === undefined) continue;
      if (seen.has(line.newLineNumber)) continue;
      seen.add(line.newLineNumber);
      changed.push(Object.freeze({ lineNumber: line.newLineNumber, content: line.content }));
    }
  }

  changed.sort((a, b) => a.lineNumber - b.lineNumber);
  return Object.freeze(changed);
}

/**
 * Extract the lines a patch adds, with their new-file line numbers.
 * Empty and binary patches yield an empty set.
 */
export function changedLines(patch: string): ChangedLineSet {
  return collectChangedLines(parseHunks(patch));
}

/**
 * Determine file status from GitHub's file status string.
 */
export function normalizeStatus(status: string): FileStatus {
  switch (status) {
    case "added":
      return "added";
    case "removed":
      return "removed";
    case "renamed":
      return "renamed";
    default:
      return "modified";
  }
}

/**
 * Check whether a file path should be excluded from review.
 */
export function shouldIgnoreFile(
  path: string,
  extraIgnorePatterns: readonly string[] = []
): boolean {
  const allPatterns = [...DEFAULT_IGNORE_PATTERNS, ...extraIgnorePatterns];
  return allPatterns.some((pattern) => minimatch(path, pattern));
}

export interface ParsedPullRequest {
  diffs: FileDiff[];
  failures: ParseFailure[];
  ignored: string[];
}

/**
 * Parse the list of PR files into FileDiff objects.
 * Files with no patch (binary, too large) become diffs with no changed lines;
 * files whose patch cannot be parsed are reported in `failures` and left out.
 */
export function parsePullRequestFiles(
  files: readonly PullRequestFile[],
  ignorePatterns: readonly string[] = []
): ParsedPullRequest {
  const diffs: FileDiff[] = [];
  const failures: ParseFailure[] = [];
  const ignored: string[] = [];

  for (const file of files) {
    if (shouldIgnoreFile(file.path, ignorePatterns)) {
      ignored.push(file.path);
      continue;
    }

    let hunks: Hunk[];
    try {
      hunks = file.patch ? parseHunks(file.patch) : [];
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      failures.push({ path: file.path, reason: err.message });
      continue;
    }

    diffs.push(
      Object.freeze({
        path: file.path,
        status: file.status,
        language: detectLanguage(file.path),
        hunks: Object.freeze(hunks),
        changedLines: collectChangedLines(hunks),
      })
    );
  }

  return { diffs, failures, ignored };
}
