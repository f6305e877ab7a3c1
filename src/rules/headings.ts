import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Sentence-case a heading: the first word starts with a capital, every
 * other word is lowercased unless it is preserved, an acronym, or has
 * internal capitals ("vSphere", "iOS").
 */
export function toSentenceCase(text: string, preserve: readonly string[] = []): string {
  const preserved = new Set(preserve.flatMap((entry) => entry.split(/\s+/)));
  let seenWord = false;

  return text
    .split(/(\s+)/)
    .map((token) => {
      if (!token || /^\s+$/.test(token)) {
        return token;
      }

      const first = !seenWord;
      seenWord = true;

      if (keepsCasing(token, preserved)) {
        return token;
      }

      if (first) {
        const lower = token.toLowerCase();
        const index = lower.search(/\p{L}/u);
        return index < 0
          ? lower
          : lower.slice(0, index) + lower[index].toUpperCase() + lower.slice(index + 1);
      }

      return token.toLowerCase();
    })
    .join("");
}

function keepsCasing(token: string, preserved: Set<string>): boolean {
  const bare = token.replace(EDGE_PUNCTUATION, "");
  if (!bare) {
    return true;
  }
  if (bare === "I" || preserved.has(bare)) {
    return true;
  }
  return /\p{Lu}/u.test(bare.slice(1));
}

export function evaluateHeadings(
  document: Document,
  options: FamilyOptions<"headings">,
  context: EvaluationContext,
): Finding[] {
  if (options.case !== "sentence") {
    return [];
  }

  const findings: Finding[] = [];
  for (const line of document.lines) {
    if (!line.heading) {
      continue;
    }

    const expected = toSentenceCase(line.heading.text, options.preserve);
    if (expected !== line.heading.text) {
      findings.push(
        context.finding(
          "heading_case",
          line.number,
          `Heading "${line.heading.text}" is not in sentence case`,
          expected,
        ),
      );
    }
  }

  return findings;
}
