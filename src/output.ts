import { filterBySeverity, shouldBlock, summarizeFindings } from "./checker";
import type { FailThreshold, Finding, Report, ReportSummary, Severity } from "./types";

export type OutputFormat = "text" | "json";

export interface FormatOptions {
  minSeverity?: Severity;
  /** Threshold reported in JSON output; defaults to the first report's. */
  failOn?: FailThreshold;
}

const GROUPS: ReadonlyArray<{ severity: Severity; heading: string }> = [
  { severity: "error", heading: "Errors" },
  { severity: "warning", heading: "Warnings" },
  { severity: "info", heading: "Info" },
];

/** Drop findings below `minimum` and recount what is left. */
export function applySeverityFilter(
  reports: readonly Report[],
  minimum: Severity,
): Report[] {
  return reports.map((report) => {
    const findings = filterBySeverity(report.findings, minimum);
    return { ...report, findings, summary: summarizeFindings(findings) };
  });
}

export function combineSummaries(reports: readonly Report[]): ReportSummary {
  return reports.reduce<ReportSummary>(
    (total, report) => ({
      total: total.total + report.summary.total,
      error: total.error + report.summary.error,
      warning: total.warning + report.summary.warning,
      info: total.info + report.summary.info,
    }),
    { total: 0, error: 0, warning: 0, info: 0 },
  );
}

export function formatTextReport(
  reports: readonly Report[],
  options: Pick<FormatOptions, "minSeverity"> = {},
): string {
  const filtered = applySeverityFilter(reports, options.minSeverity ?? "info");
  const findings = filtered.flatMap((report) => report.findings);

  if (findings.length === 0) {
    return "No style issues found.";
  }

  const lines: string[] = [];
  lines.push("Documentation style findings");
  lines.push("");

  for (const group of GROUPS) {
    const members = findings.filter((finding) => finding.severity === group.severity);
    if (members.length === 0) {
      continue;
    }

    lines.push(`${group.heading} (${members.length})`);
    for (const finding of members) {
      lines.push(`  ${location(finding)}  ${finding.message} [${finding.ruleId}]`);
      if (finding.suggestion) {
        lines.push(`    suggestion: ${finding.suggestion}`);
      }
    }
    lines.push("");
  }

  const summary = combineSummaries(filtered);
  lines.push(
    `Summary: files=${filtered.length}, total=${summary.total}, error=${summary.error}, warning=${summary.warning}, info=${summary.info}`,
  );

  return lines.join("\n");
}

export function formatJsonReport(
  reports: readonly Report[],
  options: FormatOptions = {},
): string {
  const filtered = applySeverityFilter(reports, options.minSeverity ?? "info");
  const failOn = options.failOn ?? reports[0]?.failOn ?? "error";

  return JSON.stringify(
    {
      findings: filtered.flatMap((report) => report.findings),
      summary: combineSummaries(filtered),
      files: filtered.length,
      failOn,
      shouldBlock: shouldBlock(filtered, failOn),
    },
    null,
    2,
  );
}

export function formatReports(
  reports: readonly Report[],
  format: OutputFormat,
  options: FormatOptions = {},
): string {
  return format === "json"
    ? formatJsonReport(reports, options)
    : formatTextReport(reports, options);
}

function location(finding: Finding): string {
  return finding.filePath ? `${finding.filePath}:${finding.line}` : `line ${finding.line}`;
}
