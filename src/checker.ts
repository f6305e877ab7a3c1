import type { RuleConfig } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { normalizeDocument } from "./normalize";
import { matchesAny } from "./paths";
import { bindEvaluator, type BoundEvaluator } from "./rules";
import { createEvaluationContext } from "./rules/context";
import type {
  Document,
  FailThreshold,
  Finding,
  Report,
  ReportSummary,
  Severity,
} from "./types";

const SEVERITY_RANK: Record<Severity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

export function severityMeetsThreshold(
  severity: Severity,
  threshold: FailThreshold,
): boolean {
  if (threshold === "none") {
    return false;
  }

  return SEVERITY_RANK[severity] <= SEVERITY_RANK[threshold];
}

export function selectEvaluators(config: RuleConfig): BoundEvaluator[] {
  return config.families.map(bindEvaluator);
}

/**
 * Run every evaluator against one document. A failing evaluator is reported
 * as a single info finding and the others still run.
 */
export function runEvaluators(
  document: Document,
  evaluators: readonly BoundEvaluator[],
  config: RuleConfig,
): Finding[] {
  const findings: Finding[] = [];
  const lineCount = document.lines.length;

  for (const evaluator of evaluators) {
    const context = createEvaluationContext({
      family: evaluator.family,
      config,
      lineCount,
      filePath: document.filePath,
    });

    try {
      findings.push(...evaluator.run(document, context));
    } catch (error: unknown) {
      logger.warn(
        { family: evaluator.family, filePath: document.filePath, err: errorMessage(error) },
        "rule family failed",
      );
      findings.push(
        context.finding(
          "evaluator_fault",
          1,
          `Could not fully analyze ${evaluator.family} rules: ${errorMessage(error)}`,
        ),
      );
    }
  }

  const engine = createEvaluationContext({
    family: "engine",
    config,
    lineCount,
    filePath: document.filePath,
  });
  for (const name of config.unknownFamilies) {
    findings.push(
      engine.finding(
        "unknown_rule_family",
        1,
        `Unknown rule family "${name}" in configuration was ignored`,
      ),
    );
  }

  return findings;
}

export function aggregateFindings(
  findings: readonly Finding[],
  options: { filePath?: string; exclusions?: readonly string[] } = {},
): Finding[] {
  if (options.filePath !== undefined && isExcluded(options.filePath, options.exclusions)) {
    return [];
  }

  return sortFindings(dedupeFindings(findings));
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    const severityDiff = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
    if (severityDiff !== 0) {
      return severityDiff;
    }

    const lineDiff = a.line - b.line;
    if (lineDiff !== 0) {
      return lineDiff;
    }

    return a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0;
  });
}

export function summarizeFindings(findings: readonly Finding[]): ReportSummary {
  return {
    total: findings.length,
    error: findings.filter((f) => f.severity === "error").length,
    warning: findings.filter((f) => f.severity === "warning").length,
    info: findings.filter((f) => f.severity === "info").length,
  };
}

export function filterBySeverity(
  findings: readonly Finding[],
  minimum: Severity,
): Finding[] {
  return findings.filter((finding) =>
    severityMeetsThreshold(finding.severity, minimum),
  );
}

export function isExcluded(
  filePath: string,
  exclusions: readonly string[] = [],
): boolean {
  return exclusions.length > 0 && matchesAny(filePath, exclusions);
}

export interface CheckOptions {
  filePath?: string;
  failOn?: FailThreshold;
}

export function checkDocument(
  content: string,
  config: RuleConfig,
  options: CheckOptions = {},
): Report {
  const { filePath } = options;
  const failOn = options.failOn ?? "error";

  if (filePath !== undefined && isExcluded(filePath, config.exclusions)) {
    logger.debug({ filePath }, "file excluded by configuration");
    return buildReport([], failOn, filePath);
  }

  const document = normalizeDocument(content, filePath);
  const findings = runEvaluators(document, selectEvaluators(config), config);
  const aggregated = aggregateFindings(findings, {
    filePath,
    exclusions: config.exclusions,
  });

  logger.debug(
    { filePath, format: document.format, degraded: document.degraded, findings: aggregated.length },
    "document checked",
  );

  return buildReport(aggregated, failOn, filePath);
}

export interface DocumentInput {
  filePath?: string;
  content: string;
}

/**
 * Documents share nothing but the read-only configuration, so they are
 * checked independently; reports come back in input order.
 */
export async function checkDocuments(
  inputs: readonly DocumentInput[],
  config: RuleConfig,
  options: { failOn?: FailThreshold } = {},
): Promise<Report[]> {
  return Promise.all(
    inputs.map(async (input) =>
      checkDocument(input.content, config, {
        filePath: input.filePath,
        failOn: options.failOn,
      }),
    ),
  );
}

export function shouldBlock(
  reports: readonly Report[],
  failOn: FailThreshold = "error",
): boolean {
  return reports.some((report) =>
    report.findings.some((finding) =>
      severityMeetsThreshold(finding.severity, failOn),
    ),
  );
}

function buildReport(
  findings: Finding[],
  failOn: FailThreshold,
  filePath?: string,
): Report {
  const report: Report = {
    findings,
    summary: summarizeFindings(findings),
    failOn,
  };
  if (filePath !== undefined) {
    report.filePath = filePath;
  }
  return report;
}

function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const result: Finding[] = [];

  for (const finding of findings) {
    const key = `${finding.ruleId}:${finding.line}:${finding.message}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(finding);
  }

  return result;
}
