import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { findTerm } from "./text";

export function evaluateTerminology(
  document: Document,
  options: FamilyOptions<"terminology">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const preferred = Object.entries(options.preferred ?? {});
  const properNouns = options.properNouns ?? [];
  const mentions = new Map<string, { correct: number; wrong: number; firstWrongLine?: number }>();

  for (const line of document.lines) {
    if (!line.prose) {
      continue;
    }

    for (const [deprecated, replacement] of preferred) {
      for (const match of findTerm(line.prose, deprecated)) {
        findings.push(
          context.finding(
            "preferred_terminology",
            line.number,
            `Use "${replacement}" instead of "${match}"`,
            replacement,
          ),
        );
      }
    }

    for (const noun of properNouns) {
      for (const match of findTerm(line.prose, noun)) {
        const tally = mentions.get(noun) ?? { correct: 0, wrong: 0 };
        mentions.set(noun, tally);

        if (match === noun) {
          tally.correct += 1;
          continue;
        }

        tally.wrong += 1;
        tally.firstWrongLine ??= line.number;
        findings.push(
          context.finding(
            "proper_noun_case",
            line.number,
            `"${match}" should be written "${noun}"`,
            noun,
          ),
        );
      }
    }

    for (const term of options.vagueTerms ?? []) {
      for (const match of findTerm(line.prose, term)) {
        findings.push(
          context.finding(
            "terminology_clarity",
            line.number,
            `Use a more specific term than "${match}"`,
          ),
        );
      }
    }
  }

  if (options.consistency) {
    for (const noun of properNouns) {
      const tally = mentions.get(noun);
      if (tally?.firstWrongLine !== undefined && tally.correct > 0) {
        const total = tally.correct + tally.wrong;
        findings.push(
          context.finding(
            "term_consistency",
            tally.firstWrongLine,
            `"${noun}" is capitalized inconsistently (${tally.wrong} of ${total} mentions differ)`,
            `Write "${noun}" the same way throughout`,
          ),
        );
      }
    }
  }

  return findings;
}
