import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { RULE_FAMILIES, isRuleId, type RuleFamilyKind, type RuleId } from "./catalog";
import { ConfigurationError, errorMessage } from "./errors";
import { logger } from "./logger";
import type { Severity } from "./types";

export const DEFAULT_CONFIG_PATH = ".styleguide.yaml";

const severityLevel = z.enum(["error", "warning", "info"]);
const stringList = z.array(z.string().min(1));
/** term → replacement */
const termMap = z.record(z.string().min(1), z.string().min(1));

const structureOptions = z.object({
  requiredSections: stringList.optional(),
  recommendedSections: stringList.optional(),
  tocLineThreshold: z.number().int().positive().optional(),
  maxWarningCallouts: z.number().int().nonnegative().optional(),
});

const headingsOptions = z.object({
  case: z.literal("sentence").optional(),
  preserve: stringList.default([]),
});

const referencesOptions = z.object({
  kb: z
    .object({
      minDigits: z.number().int().positive().default(4),
      requireLink: z.boolean().default(false),
    })
    .optional(),
  versionParts: z.number().int().min(2).max(4).optional(),
});

const terminologyOptions = z.object({
  preferred: termMap.optional(),
  properNouns: stringList.optional(),
  consistency: z.boolean().default(false),
  vagueTerms: stringList.optional(),
});

const piiOptions = z.object({
  emails: z.boolean().default(false),
  allowedEmailDomains: stringList.default([]),
  ipAddresses: z.boolean().default(false),
  maskedPrefix: z.string().min(1).default("x.x.x."),
  markers: stringList.optional(),
});

const languageOptions = z.object({
  inclusive: termMap.optional(),
  negative: termMap.optional(),
});

const grammarOptions = z.object({
  contractions: z.boolean().default(false),
  passiveVoice: z.boolean().default(false),
  directAddress: stringList.optional(),
  anthropomorphism: stringList.optional(),
  abilityNeutral: stringList.optional(),
  complexTerms: stringList.optional(),
  complexThreshold: z.number().int().nonnegative().default(10),
});

const formattingOptions = z.object({
  disallowedStyles: stringList.optional(),
  quotes: z.literal("double").optional(),
  stepKeywords: stringList.optional(),
});

const accessibilityOptions = z.object({
  vagueLinkText: stringList.optional(),
  imageAltText: z.boolean().default(false),
});

const trainingOptions = z.object({
  modulePattern: z
    .string()
    .refine(isValidPattern, "modulePattern must be a valid regular expression")
    .optional(),
  appliesTo: stringList.optional(),
  requiredSections: stringList.optional(),
  requireToc: z.boolean().default(false),
  codeTheme: z
    .object({
      theme: z.string().min(1),
      minLines: z.number().int().positive().default(10),
    })
    .optional(),
  requireCodeLanguage: z.boolean().default(false),
});

const ruleFamilySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("structure"), options: structureOptions }),
  z.object({ kind: z.literal("headings"), options: headingsOptions }),
  z.object({ kind: z.literal("references"), options: referencesOptions }),
  z.object({ kind: z.literal("terminology"), options: terminologyOptions }),
  z.object({ kind: z.literal("pii"), options: piiOptions }),
  z.object({ kind: z.literal("language"), options: languageOptions }),
  z.object({ kind: z.literal("grammar"), options: grammarOptions }),
  z.object({ kind: z.literal("formatting"), options: formattingOptions }),
  z.object({ kind: z.literal("accessibility"), options: accessibilityOptions }),
  z.object({ kind: z.literal("training"), options: trainingOptions }),
]);

export type RuleFamily = z.infer<typeof ruleFamilySchema>;

export type FamilyOptions<K extends RuleFamilyKind> = Extract<
  RuleFamily,
  { kind: K }
>["options"];

export interface RuleConfig {
  readonly families: readonly RuleFamily[];
  readonly severity: Readonly<Partial<Record<RuleId, Severity>>>;
  readonly exclusions: readonly string[];
  /** Family keys present in the rule file that no evaluator handles. */
  readonly unknownFamilies: readonly string[];
}

export interface ConfigLoadResult {
  config: RuleConfig;
  error?: ConfigurationError;
}

export function emptyRuleConfig(): RuleConfig {
  return freezeConfig({
    families: [],
    severity: {},
    exclusions: [],
    unknownFamilies: [],
  });
}

/**
 * Resolve a parsed rule file into a RuleConfig. Sections and families that
 * fail validation are dropped individually; everything else is kept.
 */
export function parseRuleConfig(
  raw: unknown,
  configPath?: string,
): ConfigLoadResult {
  if (raw === undefined || raw === null) {
    return { config: emptyRuleConfig() };
  }

  if (typeof raw !== "object" || Array.isArray(raw)) {
    return {
      config: emptyRuleConfig(),
      error: new ConfigurationError("Rule configuration must be a mapping", {
        configPath,
      }),
    };
  }

  const issues: string[] = [];
  const root = new Map(Object.entries(raw));

  const families: RuleFamily[] = [];
  const unknownFamilies: string[] = [];
  const rulesSection = z
    .record(z.string(), z.unknown())
    .nullable()
    .optional()
    .safeParse(root.get("rules"));

  if (!rulesSection.success) {
    issues.push("rules: must be a mapping of rule family names");
  } else {
    for (const [name, value] of Object.entries(rulesSection.data ?? {})) {
      if (!isFamilyKind(name)) {
        unknownFamilies.push(name);
        continue;
      }

      const parsed = ruleFamilySchema.safeParse({
        kind: name,
        options: value ?? {},
      });
      if (!parsed.success) {
        issues.push(`rules.${name}: ${formatIssues(parsed.error)}`);
        continue;
      }
      families.push(parsed.data);
    }
  }

  families.sort(
    (a, b) => RULE_FAMILIES.indexOf(a.kind) - RULE_FAMILIES.indexOf(b.kind),
  );

  const severity: Partial<Record<RuleId, Severity>> = {};
  const severitySection = z
    .record(z.string(), severityLevel)
    .nullable()
    .optional()
    .safeParse(root.get("severity"));

  if (!severitySection.success) {
    issues.push(`severity: ${formatIssues(severitySection.error)}`);
  } else {
    for (const [ruleId, level] of Object.entries(severitySection.data ?? {})) {
      if (!isRuleId(ruleId)) {
        logger.warn({ ruleId }, "ignoring severity override for unknown rule");
        continue;
      }
      severity[ruleId] = level;
    }
  }

  let exclusions: string[] = [];
  const exclusionsSection = stringList
    .nullable()
    .optional()
    .safeParse(root.get("exclusions"));

  if (!exclusionsSection.success) {
    issues.push(`exclusions: ${formatIssues(exclusionsSection.error)}`);
  } else {
    exclusions = exclusionsSection.data ?? [];
  }

  const config = freezeConfig({
    families,
    severity,
    exclusions,
    unknownFamilies,
  });

  if (issues.length === 0) {
    return { config };
  }

  return {
    config,
    error: new ConfigurationError(
      `Rule configuration has ${issues.length} invalid section(s); they were skipped`,
      { configPath, issues },
    ),
  };
}

export async function loadRuleConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<ConfigLoadResult> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      logger.debug({ configPath }, "no rule file found, using empty configuration");
      return { config: emptyRuleConfig() };
    }

    return failedLoad(configPath, `Cannot read rule file: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(text, { filename: configPath });
  } catch (error: unknown) {
    return failedLoad(configPath, `Invalid YAML in rule file: ${errorMessage(error)}`);
  }

  const result = parseRuleConfig(raw, configPath);
  if (result.error) {
    logger.warn(
      { configPath, issues: result.error.issues },
      result.error.message,
    );
  } else {
    logger.debug(
      { configPath, families: result.config.families.map((f) => f.kind) },
      "rule configuration loaded",
    );
  }

  return result;
}

function failedLoad(configPath: string, message: string): ConfigLoadResult {
  const error = new ConfigurationError(message, { configPath });
  logger.warn({ configPath }, message);
  return { config: emptyRuleConfig(), error };
}

function freezeConfig(config: RuleConfig): RuleConfig {
  return Object.freeze({
    families: Object.freeze([...config.families]),
    severity: Object.freeze({ ...config.severity }),
    exclusions: Object.freeze([...config.exclusions]),
    unknownFamilies: Object.freeze([...config.unknownFamilies]),
  });
}

function isFamilyKind(value: string): value is RuleFamilyKind {
  return RULE_FAMILIES.some((family) => family === value);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.filter((part) => part !== "options").join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
