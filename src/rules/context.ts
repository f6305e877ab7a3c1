import { findRule, type RuleId } from "../catalog";
import type { RuleConfig } from "../config";
import type { Finding, Severity } from "../types";

export interface EvaluationContext {
  family: string;
  filePath?: string;
  finding(ruleId: RuleId, line: number, message: string, suggestion?: string): Finding;
}

export function resolveSeverity(ruleId: RuleId, config: RuleConfig): Severity {
  const rule = findRule(ruleId);
  const severity = config.severity[ruleId] ?? rule?.severity ?? "info";

  if (rule?.advisory && severity === "error") {
    return "warning";
  }

  return severity;
}

export function createEvaluationContext(params: {
  family: string;
  config: RuleConfig;
  lineCount: number;
  filePath?: string;
}): EvaluationContext {
  const { family, config, lineCount, filePath } = params;

  return {
    family,
    filePath,
    finding(ruleId, line, message, suggestion) {
      const finding: Finding = {
        ruleId,
        family,
        severity: resolveSeverity(ruleId, config),
        line: Math.min(Math.max(1, line), Math.max(1, lineCount)),
        message,
      };
      if (filePath !== undefined) {
        finding.filePath = filePath;
      }
      if (suggestion !== undefined) {
        finding.suggestion = suggestion;
      }
      return finding;
    },
  };
}
