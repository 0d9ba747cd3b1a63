import type { FileSummary, Finding, Severity, SeverityCounts } from "../types.js";

export const SEVERITY_RANK: Record<Severity, number> = {
  error: 3,
  warning: 2,
  info: 1,
};

export const SEVERITIES: readonly Severity[] = ["error", "warning", "info"];

// Code-unit order, independent of the runner's locale
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order findings by severity (highest first), then file, then line.
 * Equal keys keep their input order, which is analyzer registration order.
 */
export function rankFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    const severityDelta = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
    if (severityDelta !== 0) return severityDelta;

    const fileCmp = compareText(a.file, b.file);
    if (fileCmp !== 0) return fileCmp;

    return a.line - b.line;
  });
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { error: 0, warning: 0, info: 0 };
  for (const finding of findings) counts[finding.severity]++;
  return counts;
}

/**
 * One row per file that has at least one finding, sorted by path.
 */
export function summarizeByFile(findings: readonly Finding[]): FileSummary[] {
  const byFile = new Map<string, SeverityCounts>();
  for (const finding of findings) {
    let counts = byFile.get(finding.file);
    if (!counts) {
      counts = { error: 0, warning: 0, info: 0 };
      byFile.set(finding.file, counts);
    }
    counts[finding.severity]++;
  }

  return [...byFile.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([path, counts]) => Object.freeze({ path, ...counts }));
}
