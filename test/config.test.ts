import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadRuleConfig, parseRuleConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";

describe("parseRuleConfig", () => {
  test("returns an empty configuration for an empty file", () => {
    const result = parseRuleConfig(undefined);

    expect(result.error).toBeUndefined();
    expect(result.config.families).toEqual([]);
    expect(result.config.exclusions).toEqual([]);
  });

  test("rejects a root that is not a mapping", () => {
    const result = parseRuleConfig("just text", "rules.yaml");

    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.error?.message).toBe("Rule configuration must be a mapping");
    expect(result.error?.configPath).toBe("rules.yaml");
    expect(result.config.families).toEqual([]);
  });

  test("drops an invalid family and keeps the rest", () => {
    const result = parseRuleConfig({
      rules: {
        headings: { case: "title" },
        pii: { emails: true },
      },
    });

    expect(result.config.families.map((family) => family.kind)).toEqual(["pii"]);
    expect(result.error?.message).toBe(
      "Rule configuration has 1 invalid section(s); they were skipped",
    );
    expect(result.error?.issues).toHaveLength(1);
    expect(result.error?.issues[0].startsWith("rules.headings: case:")).toBe(true);
  });

  test("applies option defaults", () => {
    const result = parseRuleConfig({ rules: { pii: { emails: true } } });
    const [family] = result.config.families;

    expect(family).toEqual({
      kind: "pii",
      options: {
        emails: true,
        allowedEmailDomains: [],
        ipAddresses: false,
        maskedPrefix: "x.x.x.",
      },
    });
  });

  test("treats an empty family entry as enabled with defaults", () => {
    const result = parseRuleConfig({ rules: { headings: null } });

    expect(result.error).toBeUndefined();
    expect(result.config.families).toEqual([
      { kind: "headings", options: { preserve: [] } },
    ]);
  });

  test("records unknown families without failing", () => {
    const result = parseRuleConfig({ rules: { spelling: { enabled: true } } });

    expect(result.error).toBeUndefined();
    expect(result.config.families).toEqual([]);
    expect(result.config.unknownFamilies).toEqual(["spelling"]);
  });

  test("orders families the same way regardless of file order", () => {
    const result = parseRuleConfig({ rules: { training: {}, structure: {} } });

    expect(result.config.families.map((family) => family.kind)).toEqual([
      "structure",
      "training",
    ]);
  });

  test("keeps severity overrides for known rules only", () => {
    const result = parseRuleConfig({
      severity: { heading_case: "error", no_such_rule: "info" },
    });

    expect(result.error).toBeUndefined();
    expect(result.config.severity).toEqual({ heading_case: "error" });
  });

  test("reports an invalid severity level", () => {
    const result = parseRuleConfig({ severity: { heading_case: "fatal" } });

    expect(result.error?.issues).toHaveLength(1);
    expect(result.config.severity).toEqual({});
  });

  test("rejects a training module pattern that is not a regular expression", () => {
    const result = parseRuleConfig({ rules: { training: { modulePattern: "([" } } });

    expect(result.config.families).toEqual([]);
    expect(result.error?.issues).toEqual([
      "rules.training: modulePattern: modulePattern must be a valid regular expression",
    ]);
  });

  test("returns a frozen configuration", () => {
    const { config } = parseRuleConfig({ exclusions: ["drafts/**"] });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.exclusions)).toBe(true);
    expect(config.exclusions).toEqual(["drafts/**"]);
  });
});

describe("loadRuleConfig", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docstyle-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("uses an empty configuration when the file is missing", async () => {
    const result = await loadRuleConfig(join(dir, "missing.yaml"));

    expect(result.error).toBeUndefined();
    expect(result.config.families).toEqual([]);
  });

  test("reports invalid YAML and continues with an empty configuration", async () => {
    const path = join(dir, "broken.yaml");
    await writeFile(path, "rules: [unclosed\n", "utf8");

    const result = await loadRuleConfig(path);

    expect(result.error?.message.startsWith("Invalid YAML in rule file:")).toBe(true);
    expect(result.config.families).toEqual([]);
  });

  test("loads families from a YAML rule file", async () => {
    const path = join(dir, ".styleguide.yaml");
    await writeFile(
      path,
      [
        "rules:",
        "  headings:",
        "    case: sentence",
        "  references:",
        "    kb:",
        "      minDigits: 4",
        "exclusions:",
        "  - drafts/**",
        "",
      ].join("\n"),
      "utf8",
    );

    const result = await loadRuleConfig(path);

    expect(result.error).toBeUndefined();
    expect(result.config.families).toEqual([
      { kind: "headings", options: { case: "sentence", preserve: [] } },
      { kind: "references", options: { kb: { minDigits: 4, requireLink: false } } },
    ]);
    expect(result.config.exclusions).toEqual(["drafts/**"]);
  });
});
