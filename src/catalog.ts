import type { Severity } from "./types";

export const RULE_FAMILIES = [
  "structure",
  "headings",
  "references",
  "terminology",
  "pii",
  "language",
  "grammar",
  "formatting",
  "accessibility",
  "training",
] as const;

export type RuleFamilyKind = (typeof RULE_FAMILIES)[number];

export interface RuleInfo {
  id: string;
  family: RuleFamilyKind | "engine";
  severity: Severity;
  title: string;
  /** Heuristic rules never report above warning. */
  advisory?: boolean;
}

export const RULES = [
  {
    id: "required_section",
    family: "structure",
    severity: "error",
    title: "Required section is missing",
  },
  {
    id: "recommended_section",
    family: "structure",
    severity: "info",
    title: "Recommended section is missing",
  },
  {
    id: "table_of_contents",
    family: "structure",
    severity: "info",
    title: "Long document without a table of contents",
  },
  {
    id: "callout_balance",
    family: "structure",
    severity: "info",
    title: "Too many warning callouts",
  },
  {
    id: "heading_case",
    family: "headings",
    severity: "warning",
    title: "Heading is not in sentence case",
    advisory: true,
  },
  {
    id: "kb_reference_format",
    family: "references",
    severity: "info",
    title: "KB reference does not use the KB-#### form",
  },
  {
    id: "kb_reference_link",
    family: "references",
    severity: "info",
    title: "KB reference is not linked",
  },
  {
    id: "version_format",
    family: "references",
    severity: "info",
    title: "Version number is not fully qualified",
  },
  {
    id: "preferred_terminology",
    family: "terminology",
    severity: "warning",
    title: "Deprecated term in place of the preferred one",
  },
  {
    id: "proper_noun_case",
    family: "terminology",
    severity: "info",
    title: "Product or proper noun is miscapitalized",
  },
  {
    id: "term_consistency",
    family: "terminology",
    severity: "warning",
    title: "Proper noun capitalized inconsistently",
  },
  {
    id: "terminology_clarity",
    family: "terminology",
    severity: "info",
    title: "Vague term",
  },
  {
    id: "pii_email",
    family: "pii",
    severity: "error",
    title: "Possible e-mail address",
  },
  {
    id: "pii_ip_address",
    family: "pii",
    severity: "error",
    title: "Possible unmasked IP address",
  },
  {
    id: "pii_marker",
    family: "pii",
    severity: "error",
    title: "Personal data marker",
  },
  {
    id: "inclusive_language",
    family: "language",
    severity: "error",
    title: "Non-inclusive term",
  },
  {
    id: "negative_terms",
    family: "language",
    severity: "warning",
    title: "Negative term",
  },
  {
    id: "contractions",
    family: "grammar",
    severity: "warning",
    title: "Contraction",
    advisory: true,
  },
  {
    id: "passive_voice",
    family: "grammar",
    severity: "info",
    title: "Possible passive voice",
    advisory: true,
  },
  {
    id: "direct_address",
    family: "grammar",
    severity: "info",
    title: "Third-person reference to the reader",
    advisory: true,
  },
  {
    id: "anthropomorphism",
    family: "grammar",
    severity: "warning",
    title: "Anthropomorphic language",
    advisory: true,
  },
  {
    id: "ability_neutral",
    family: "grammar",
    severity: "info",
    title: "Ability-specific phrasing",
    advisory: true,
  },
  {
    id: "complex_language",
    family: "grammar",
    severity: "info",
    title: "Heavy use of complex terms",
    advisory: true,
  },
  {
    id: "inline_styles",
    family: "formatting",
    severity: "warning",
    title: "Disallowed inline style",
  },
  {
    id: "quote_style",
    family: "formatting",
    severity: "info",
    title: "Quote characters should be straight double quotes",
  },
  {
    id: "list_style",
    family: "formatting",
    severity: "info",
    title: "Sequential steps in a bulleted list",
  },
  {
    id: "descriptive_links",
    family: "accessibility",
    severity: "warning",
    title: "Non-descriptive link text",
  },
  {
    id: "image_alt_text",
    family: "accessibility",
    severity: "warning",
    title: "Image without alt text",
  },
  {
    id: "module_name",
    family: "training",
    severity: "warning",
    title: "Module file name does not follow the naming convention",
  },
  {
    id: "training_section",
    family: "training",
    severity: "info",
    title: "Training module section is missing",
  },
  {
    id: "training_toc",
    family: "training",
    severity: "warning",
    title: "Training module without a table of contents",
  },
  {
    id: "code_block_theme",
    family: "training",
    severity: "info",
    title: "Long code block without the configured theme",
  },
  {
    id: "code_block_language",
    family: "training",
    severity: "info",
    title: "Code block without a language",
  },
  {
    id: "evaluator_fault",
    family: "engine",
    severity: "info",
    title: "Rule family could not be fully evaluated",
  },
  {
    id: "unknown_rule_family",
    family: "engine",
    severity: "info",
    title: "Unknown rule family in configuration",
  },
] as const satisfies readonly RuleInfo[];

export type RuleId = (typeof RULES)[number]["id"];

const RULES_BY_ID = new Map<string, RuleInfo>(
  RULES.map((rule) => [rule.id, rule]),
);

export function listRules(): readonly RuleInfo[] {
  return RULES;
}

export function findRule(ruleId: string): RuleInfo | undefined {
  return RULES_BY_ID.get(ruleId);
}

export function isRuleId(value: string): value is RuleId {
  return RULES_BY_ID.has(value);
}
