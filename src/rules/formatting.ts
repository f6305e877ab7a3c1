import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";

const STYLE_ATTRIBUTE = /\bstyle\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;
const QUOTED_PHRASE = /“([^”]*)”|‘([^’]*)’|(?<=^|[\s(\[])'([^'\n]+)'(?=$|[\s.,;:!?)\]])/g;
const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;

export function evaluateFormatting(
  document: Document,
  options: FamilyOptions<"formatting">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const disallowed = (options.disallowedStyles ?? []).map((style) => style.toLowerCase());
  const stepKeywords = (options.stepKeywords ?? []).map((keyword) => keyword.toLowerCase());

  for (const line of document.lines) {
    if (disallowed.length > 0 && !line.inCode) {
      for (const match of line.raw.matchAll(STYLE_ATTRIBUTE)) {
        const declarations = match[1] ?? match[2] ?? "";
        for (const property of cssProperties(declarations)) {
          if (disallowed.includes("*") || disallowed.includes(property)) {
            findings.push(
              context.finding(
                "inline_styles",
                line.number,
                `Inline style sets "${property}"`,
                "Remove the inline style and use the default formatting",
              ),
            );
          }
        }
      }
    }

    if (options.quotes === "double" && line.prose) {
      for (const match of line.prose.matchAll(QUOTED_PHRASE)) {
        const inner = match[1] ?? match[2] ?? match[3] ?? "";
        findings.push(
          context.finding(
            "quote_style",
            line.number,
            `Quoted text ${match[0]} should use straight double quotes`,
            `"${inner}"`,
          ),
        );
      }
    }

    if (
      stepKeywords.length > 0 &&
      line.listItem &&
      line.list === "unordered" &&
      line.prose
    ) {
      const text = line.prose.replace(LIST_MARKER, "").trim().toLowerCase();
      const keyword = stepKeywords.find(
        (candidate) =>
          text.startsWith(candidate) && !/^\p{L}/u.test(text.slice(candidate.length)),
      );
      if (keyword) {
        findings.push(
          context.finding(
            "list_style",
            line.number,
            `Bulleted list item starts with the step keyword "${keyword}"`,
            "Use a numbered list for sequential steps",
          ),
        );
      }
    }
  }

  return findings;
}

function cssProperties(declarations: string): string[] {
  return declarations
    .split(";")
    .map((declaration) => declaration.split(":")[0].trim().toLowerCase())
    .filter((property) => property.length > 0);
}
