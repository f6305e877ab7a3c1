import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { normalizeHeadingText } from "./text";

export function headingSet(document: Document): Set<string> {
  const headings = new Set<string>();
  for (const line of document.lines) {
    if (line.heading) {
      headings.add(normalizeHeadingText(line.heading.text));
    }
  }
  return headings;
}

export function evaluateStructure(
  document: Document,
  options: FamilyOptions<"structure">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const headings = headingSet(document);

  for (const section of options.requiredSections ?? []) {
    if (!headings.has(normalizeHeadingText(section))) {
      findings.push(
        context.finding(
          "required_section",
          1,
          `Missing required section "${section}"`,
          `Add a "${section}" heading`,
        ),
      );
    }
  }

  for (const section of options.recommendedSections ?? []) {
    if (!headings.has(normalizeHeadingText(section))) {
      findings.push(
        context.finding(
          "recommended_section",
          1,
          `Consider adding a "${section}" section`,
          `Add a "${section}" heading`,
        ),
      );
    }
  }

  const threshold = options.tocLineThreshold;
  if (
    threshold !== undefined &&
    document.lines.length > threshold &&
    !document.hasTocMarker
  ) {
    findings.push(
      context.finding(
        "table_of_contents",
        1,
        `Document has ${document.lines.length} lines but no table of contents`,
        "Add a table of contents near the top of the document",
      ),
    );
  }

  const maxWarnings = options.maxWarningCallouts;
  if (maxWarnings !== undefined) {
    const warnings = document.callouts.filter(
      (callout) => callout.purpose === "warning",
    );
    if (warnings.length > maxWarnings) {
      findings.push(
        context.finding(
          "callout_balance",
          warnings[maxWarnings].line,
          `Document has ${warnings.length} warning callouts (at most ${maxWarnings} recommended)`,
          "Keep warnings for critical safety information",
        ),
      );
    }
  }

  return findings;
}
