import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";

const HTML_LINK = /<a\b[^>]*>([\s\S]*?)<\/a\s*>/gi;
const MARKDOWN_LINK = /(?<!!)\[([^\]]+)\]\([^)]*\)/g;
const IMAGE_TAG = /<img\b[^>]*>/gi;
const CONFLUENCE_IMAGE_TAG = /<ac:image\b[^>]*>/gi;
const ALT_ATTRIBUTE = /\balt\s*=\s*(?:"[^"]*\S[^"]*"|'[^']*\S[^']*'|[^\s"'>]+)/i;
const CONFLUENCE_ALT_ATTRIBUTE = /\bac:alt\s*=\s*(?:"[^"]*\S[^"]*"|'[^']*\S[^']*')/i;

export function evaluateAccessibility(
  document: Document,
  options: FamilyOptions<"accessibility">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const vague = new Set((options.vagueLinkText ?? []).map(normalizeLinkText));

  for (const line of document.lines) {
    if (line.inCode) {
      continue;
    }

    if (vague.size > 0) {
      const texts = [
        ...Array.from(line.raw.matchAll(HTML_LINK), (match) => match[1]),
        ...Array.from(line.raw.matchAll(MARKDOWN_LINK), (match) => match[1]),
      ];
      for (const text of texts) {
        const label = text.replace(/<[^>]*>/g, "").replace(/\s+/g, " ").trim();
        if (vague.has(normalizeLinkText(label))) {
          findings.push(
            context.finding(
              "descriptive_links",
              line.number,
              `Link text "${label}" does not describe its target`,
              "Use link text that names the destination",
            ),
          );
        }
      }
    }

    if (options.imageAltText) {
      const missing = [
        ...Array.from(line.raw.matchAll(IMAGE_TAG), (match) => match[0]).filter(
          (tag) => !ALT_ATTRIBUTE.test(tag),
        ),
        ...Array.from(line.raw.matchAll(CONFLUENCE_IMAGE_TAG), (match) => match[0]).filter(
          (tag) => !CONFLUENCE_ALT_ATTRIBUTE.test(tag),
        ),
      ];
      for (const tag of missing) {
        findings.push(
          context.finding(
            "image_alt_text",
            line.number,
            `Image has no alt text: ${tag}`,
            "Add alt text that describes the image",
          ),
        );
      }
    }
  }

  return findings;
}

function normalizeLinkText(text: string): string {
  return text.trim().toLowerCase().replace(/[.!?:]+$/, "");
}
