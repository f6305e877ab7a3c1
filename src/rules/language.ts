import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { findTerm } from "./text";

export function evaluateLanguage(
  document: Document,
  options: FamilyOptions<"language">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const inclusive = Object.entries(options.inclusive ?? {});
  const negative = Object.entries(options.negative ?? {});

  for (const line of document.lines) {
    if (!line.prose) {
      continue;
    }

    for (const [term, replacement] of inclusive) {
      for (const match of findTerm(line.prose, term)) {
        findings.push(
          context.finding(
            "inclusive_language",
            line.number,
            `Non-inclusive term "${match}"`,
            replacement,
          ),
        );
      }
    }

    for (const [term, replacement] of negative) {
      for (const match of findTerm(line.prose, term)) {
        findings.push(
          context.finding(
            "negative_terms",
            line.number,
            `Negative term "${match}"`,
            replacement,
          ),
        );
      }
    }
  }

  return findings;
}
