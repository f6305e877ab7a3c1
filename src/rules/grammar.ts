import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { findTerm } from "./text";

const CONTRACTION_PATTERN =
  /(?<![\p{L}'’])(?:[A-Za-z]+n['’]t|[A-Za-z]+['’](?:re|ve|ll|d|m)|(?:it|that|there|here|what|who|where|let)['’]s)(?![\p{L}])/giu;

const IRREGULAR_EXPANSIONS: Record<string, string> = {
  "won't": "will not",
  "can't": "cannot",
  "shan't": "shall not",
  "let's": "let us",
};

const SUFFIX_EXPANSIONS: Array<[string, string]> = [
  ["n't", " not"],
  ["'re", " are"],
  ["'ve", " have"],
  ["'ll", " will"],
  ["'d", " would"],
  ["'m", " am"],
  ["'s", " is"],
];

const IRREGULAR_PARTICIPLES = [
  "begun",
  "broken",
  "built",
  "chosen",
  "done",
  "drawn",
  "driven",
  "found",
  "given",
  "held",
  "hidden",
  "kept",
  "known",
  "made",
  "put",
  "run",
  "seen",
  "sent",
  "set",
  "shown",
  "taken",
  "thrown",
  "written",
];

const PASSIVE_PATTERN = new RegExp(
  `\\b(?:am|is|are|was|were|be|been|being)\\s+(?:\\w{2,}ed|${IRREGULAR_PARTICIPLES.join("|")})\\b`,
  "gi",
);

export function expandContraction(contraction: string): string {
  const normalized = contraction.replace(/’/g, "'");
  const lower = normalized.toLowerCase();

  let expanded = IRREGULAR_EXPANSIONS[lower];
  if (!expanded) {
    const suffix = SUFFIX_EXPANSIONS.find(([ending]) => lower.endsWith(ending));
    expanded = suffix ? lower.slice(0, -suffix[0].length) + suffix[1] : lower;
  }

  return /^\p{Lu}/u.test(normalized)
    ? expanded[0].toUpperCase() + expanded.slice(1)
    : expanded;
}

export function evaluateGrammar(
  document: Document,
  options: FamilyOptions<"grammar">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const complexTerms = options.complexTerms ?? [];
  let complexCount = 0;
  let firstComplexLine: number | undefined;
  const complexFound = new Set<string>();

  for (const line of document.lines) {
    if (!line.prose) {
      continue;
    }

    if (options.contractions) {
      for (const [contraction] of line.prose.matchAll(CONTRACTION_PATTERN)) {
        findings.push(
          context.finding(
            "contractions",
            line.number,
            `Contraction "${contraction}"`,
            expandContraction(contraction),
          ),
        );
      }
    }

    if (options.passiveVoice) {
      for (const [phrase] of line.prose.matchAll(PASSIVE_PATTERN)) {
        findings.push(
          context.finding(
            "passive_voice",
            line.number,
            `Possible passive voice: "${phrase}"`,
            "Rewrite the sentence so that its subject performs the action",
          ),
        );
      }
    }

    for (const phrase of options.directAddress ?? []) {
      for (const match of findTerm(line.prose, phrase)) {
        findings.push(
          context.finding(
            "direct_address",
            line.number,
            `Third-person reference "${match}"`,
            'Address the reader as "you"',
          ),
        );
      }
    }

    for (const phrase of options.anthropomorphism ?? []) {
      for (const match of findTerm(line.prose, phrase)) {
        findings.push(
          context.finding(
            "anthropomorphism",
            line.number,
            `Anthropomorphic phrase "${match}"`,
            "Describe what the system does instead",
          ),
        );
      }
    }

    for (const phrase of options.abilityNeutral ?? []) {
      for (const match of findTerm(line.prose, phrase)) {
        findings.push(
          context.finding(
            "ability_neutral",
            line.number,
            `Ability-specific phrase "${match}"`,
            "Use wording that does not assume how the reader perceives the content",
          ),
        );
      }
    }

    for (const term of complexTerms) {
      const hits = findTerm(line.prose, term).length;
      if (hits > 0) {
        complexCount += hits;
        complexFound.add(term);
        firstComplexLine ??= line.number;
      }
    }
  }

  if (firstComplexLine !== undefined && complexCount > options.complexThreshold) {
    findings.push(
      context.finding(
        "complex_language",
        firstComplexLine,
        `${complexCount} uses of complex terms (${[...complexFound].join(", ")})`,
        'Prefer simpler words, such as "use" for "utilize"',
      ),
    );
  }

  return findings;
}
