import type { FamilyOptions } from "../config";
import { baseName, matchesAny } from "../paths";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { headingSet } from "./structure";
import { normalizeHeadingText } from "./text";

export function evaluateTraining(
  document: Document,
  options: FamilyOptions<"training">,
  context: EvaluationContext,
): Finding[] {
  const { filePath } = context;
  if (filePath !== undefined && options.appliesTo && !matchesAny(filePath, options.appliesTo)) {
    return [];
  }

  const findings: Finding[] = [];

  if (options.modulePattern && filePath !== undefined) {
    const moduleName = baseName(filePath);
    if (!new RegExp(options.modulePattern).test(moduleName)) {
      findings.push(
        context.finding(
          "module_name",
          1,
          `Module name "${moduleName}" does not match ${options.modulePattern}`,
          "Rename the file to follow the module naming convention",
        ),
      );
    }
  }

  const headings = headingSet(document);
  for (const section of options.requiredSections ?? []) {
    if (!headings.has(normalizeHeadingText(section))) {
      findings.push(
        context.finding(
          "training_section",
          1,
          `Training module is missing the "${section}" section`,
          `Add a "${section}" heading`,
        ),
      );
    }
  }

  if (options.requireToc && !document.hasTocMarker) {
    findings.push(
      context.finding(
        "training_toc",
        1,
        "Training module has no table of contents",
        "Add a table of contents near the top of the module",
      ),
    );
  }

  for (const block of document.codeBlocks) {
    const { codeTheme } = options;
    if (
      codeTheme &&
      block.lineCount > codeTheme.minLines &&
      block.theme?.toLowerCase() !== codeTheme.theme.toLowerCase()
    ) {
      findings.push(
        context.finding(
          "code_block_theme",
          block.startLine,
          `Code block of ${block.lineCount} lines does not use the "${codeTheme.theme}" theme`,
          `Apply the "${codeTheme.theme}" theme`,
        ),
      );
    }

    if (options.requireCodeLanguage && !block.language) {
      findings.push(
        context.finding(
          "code_block_language",
          block.startLine,
          "Code block has no language",
          "Tag the code block with its language",
        ),
      );
    }
  }

  return findings;
}
