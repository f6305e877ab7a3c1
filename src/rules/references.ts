import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";

const KB_PATTERN = /\bKB-?\d+\b/gi;
const VERSION_PATTERN = /(?<![\w.])\d+(?:\.\d+)+(?!\w|\.\d)/g;
const LINK_MARKUP = /<a\b|href\s*=|<ac:link\b|\]\(/i;

export function evaluateReferences(
  document: Document,
  options: FamilyOptions<"references">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const { kb, versionParts } = options;

  for (const line of document.lines) {
    if (!line.prose) {
      continue;
    }

    if (kb) {
      const canonical = new RegExp(`^KB-\\d{${kb.minDigits},}$`);
      const linked = LINK_MARKUP.test(line.raw);

      for (const [reference] of line.prose.matchAll(KB_PATTERN)) {
        if (!canonical.test(reference)) {
          const digits = reference.replace(/\D/g, "");
          findings.push(
            context.finding(
              "kb_reference_format",
              line.number,
              `KB reference "${reference}" does not use the form KB-${"#".repeat(kb.minDigits)}`,
              digits.length >= kb.minDigits
                ? `KB-${digits}`
                : `Use the full ${kb.minDigits}-digit article number`,
            ),
          );
        }

        if (kb.requireLink && !linked) {
          findings.push(
            context.finding(
              "kb_reference_link",
              line.number,
              `KB reference "${reference}" is not linked`,
              "Link the reference to the knowledge base article",
            ),
          );
        }
      }
    }

    if (versionParts !== undefined) {
      for (const [version] of line.prose.matchAll(VERSION_PATTERN)) {
        const parts = version.split(".").length;
        if (parts < versionParts) {
          findings.push(
            context.finding(
              "version_format",
              line.number,
              `Version number "${version}" has ${parts} parts; use the full ${versionParts}-part form`,
              version + ".0".repeat(versionParts - parts),
            ),
          );
        }
      }
    }
  }

  return findings;
}
