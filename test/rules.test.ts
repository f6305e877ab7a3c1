import { describe, expect, test } from "vitest";
import { checkDocument } from "../src/checker";
import { parseRuleConfig } from "../src/config";
import { expandContraction } from "../src/rules/grammar";
import { toSentenceCase } from "../src/rules/headings";
import type { Finding } from "../src/types";

function check(
  content: string,
  raw: Record<string, unknown>,
  filePath?: string,
): Finding[] {
  const { config, error } = parseRuleConfig(raw);
  if (error) {
    throw error;
  }
  return checkDocument(content, config, { filePath }).findings;
}

function ids(findings: Finding[]): string[] {
  return findings.map((finding) => finding.ruleId);
}

describe("structure rules", () => {
  test("reports missing required and recommended sections", () => {
    const findings = check("# Introduction\nBody", {
      rules: {
        structure: {
          requiredSections: ["Overview"],
          recommendedSections: ["Prerequisites"],
        },
      },
    });

    expect(findings).toEqual([
      {
        ruleId: "required_section",
        family: "structure",
        severity: "error",
        line: 1,
        message: 'Missing required section "Overview"',
        suggestion: 'Add a "Overview" heading',
      },
      {
        ruleId: "recommended_section",
        family: "structure",
        severity: "info",
        line: 1,
        message: 'Consider adding a "Prerequisites" section',
        suggestion: 'Add a "Prerequisites" heading',
      },
    ]);
  });

  test("matches section headings without regard to case", () => {
    const findings = check("<h2>overview</h2>\n<p>Body</p>", {
      rules: { structure: { requiredSections: ["Overview"] } },
    });

    expect(findings).toEqual([]);
  });

  test("asks for a table of contents in long documents", () => {
    const findings = check("a\nb\nc\nd\ne", {
      rules: { structure: { tocLineThreshold: 3 } },
    });

    expect(findings.map((f) => f.message)).toEqual([
      "Document has 5 lines but no table of contents",
    ]);
  });

  test("reports the first warning callout over the limit", () => {
    const findings = check("Warning: one\ntext\nWarning: two\nWarning: three", {
      rules: { structure: { maxWarningCallouts: 1 } },
    });

    expect(findings).toHaveLength(1);
    expect(findings[0].ruleId).toBe("callout_balance");
    expect(findings[0].line).toBe(3);
    expect(findings[0].message).toBe(
      "Document has 3 warning callouts (at most 1 recommended)",
    );
  });
});

describe("heading rules", () => {
  test("sentence-cases words while keeping acronyms and preserved terms", () => {
    expect(toSentenceCase("How To Configure The Node")).toBe("How to configure the node");
    expect(toSentenceCase("Install Windows Server Updates", ["Windows Server"])).toBe(
      "Install Windows Server updates",
    );
    expect(toSentenceCase("Configure DNS and vSphere")).toBe("Configure DNS and vSphere");
  });

  test("reports headings that are not in sentence case", () => {
    const findings = check("## Install Windows Server Updates\n## Configure DNS and vSphere", {
      rules: { headings: { case: "sentence", preserve: ["Windows Server"] } },
    });

    expect(findings).toEqual([
      {
        ruleId: "heading_case",
        family: "headings",
        severity: "warning",
        line: 1,
        message: 'Heading "Install Windows Server Updates" is not in sentence case',
        suggestion: "Install Windows Server updates",
      },
    ]);
  });
});

describe("reference rules", () => {
  const kbRules = { rules: { references: { kb: { minDigits: 4 } } } };

  test("reports short KB numbers", () => {
    const findings = check("Refer to KB-123", kbRules);

    expect(findings).toEqual([
      {
        ruleId: "kb_reference_format",
        family: "references",
        severity: "info",
        line: 1,
        message: 'KB reference "KB-123" does not use the form KB-####',
        suggestion: "Use the full 4-digit article number",
      },
    ]);
  });

  test("suggests the canonical form when the number is long enough", () => {
    const findings = check("See KB12345 first", kbRules);

    expect(findings.map((f) => f.suggestion)).toEqual(["KB-12345"]);
  });

  test("accepts well-formed references", () => {
    expect(check("See KB-1234", kbRules)).toEqual([]);
  });

  test("requires links when configured", () => {
    const rules = { rules: { references: { kb: { minDigits: 4, requireLink: true } } } };

    expect(ids(check("See KB-1234", rules))).toEqual(["kb_reference_link"]);
    expect(
      check('<p>See <a href="https://kb.example.com/KB-1234">KB-1234</a></p>', rules),
    ).toEqual([]);
  });

  test("reports version numbers with too few parts", () => {
    const findings = check("Upgrade to 7.3 or 7.3.1", {
      rules: { references: { versionParts: 3 } },
    });

    expect(findings).toHaveLength(1);
    expect(findings[0].message).toBe(
      'Version number "7.3" has 2 parts; use the full 3-part form',
    );
    expect(findings[0].suggestion).toBe("7.3.0");
  });
});

describe("terminology rules", () => {
  test("suggests the preferred term", () => {
    const findings = check("Click on Save", {
      rules: { terminology: { preferred: { "click on": "select" } } },
    });

    expect(findings.map((f) => [f.ruleId, f.message, f.suggestion])).toEqual([
      ["preferred_terminology", 'Use "select" instead of "Click on"', "select"],
    ]);
  });

  test("reports miscapitalized and inconsistent proper nouns", () => {
    const findings = check("Push to GitHub.\nOpen the github settings.", {
      rules: { terminology: { properNouns: ["GitHub"], consistency: true } },
    });

    expect(findings.map((f) => [f.ruleId, f.severity, f.line, f.message])).toEqual([
      [
        "term_consistency",
        "warning",
        2,
        '"GitHub" is capitalized inconsistently (1 of 2 mentions differ)',
      ],
      ["proper_noun_case", "info", 2, '"github" should be written "GitHub"'],
    ]);
  });

  test("reports vague terms", () => {
    const findings = check("Remove the stuff", {
      rules: { terminology: { vagueTerms: ["stuff"] } },
    });

    expect(findings.map((f) => f.message)).toEqual([
      'Use a more specific term than "stuff"',
    ]);
  });
});

describe("pii rules", () => {
  const piiRules = {
    rules: {
      pii: {
        emails: true,
        allowedEmailDomains: ["example.com"],
        ipAddresses: true,
        markers: ["SSN"],
      },
    },
  };

  test("reports e-mail addresses in prose as errors", () => {
    const findings = check("Contact jane.doe@corp.test today", piiRules);

    expect(findings.map((f) => [f.ruleId, f.severity, f.line, f.message])).toEqual([
      ["pii_email", "error", 1, 'Possible e-mail address "jane.doe@corp.test"'],
    ]);
  });

  test("ignores addresses inside code", () => {
    expect(check("```\nmail jane.doe@corp.test\n```", piiRules)).toEqual([]);
    expect(check("<pre>\nmail jane.doe@corp.test\n</pre>", piiRules)).toEqual([]);
  });

  test("allows configured domains and their subdomains", () => {
    expect(check("Write to admin@example.com or ops@mail.example.com", piiRules)).toEqual(
      [],
    );
  });

  test("reports unmasked IP addresses", () => {
    const findings = check("Server 10.1.2.3 is up", piiRules);

    expect(findings.map((f) => [f.ruleId, f.suggestion])).toEqual([
      ["pii_ip_address", "Mask the address, for example x.x.x.3"],
    ]);
    expect(check("Server x.x.x.3 is up", piiRules)).toEqual([]);
    expect(check("Build 1.2.3.400 is out", piiRules)).toEqual([]);
  });

  test("reports personal data markers", () => {
    const findings = check("Record the ssn here", piiRules);

    expect(findings.map((f) => f.message)).toEqual(['Personal data marker "SSN"']);
  });
});

describe("language rules", () => {
  test("reports non-inclusive and negative terms", () => {
    const findings = check("Add the host to the Whitelist.\nYou cannot undo this.", {
      rules: {
        language: {
          inclusive: { whitelist: "allowlist" },
          negative: { cannot: "is not able to" },
        },
      },
    });

    expect(findings.map((f) => [f.ruleId, f.severity, f.line, f.message, f.suggestion])).toEqual([
      ["inclusive_language", "error", 1, 'Non-inclusive term "Whitelist"', "allowlist"],
      ["negative_terms", "warning", 2, 'Negative term "cannot"', "is not able to"],
    ]);
  });
});

describe("grammar rules", () => {
  test("expands contractions", () => {
    expect(expandContraction("Don't")).toBe("Do not");
    expect(expandContraction("won't")).toBe("will not");
    expect(expandContraction("It’s")).toBe("It is");
    expect(expandContraction("I'm")).toBe("I am");
  });

  test("reports contractions with their expansion", () => {
    const findings = check("Don't restart. It's fine. I'm done.", {
      rules: { grammar: { contractions: true } },
    });

    expect(findings.map((f) => [f.message, f.suggestion])).toEqual([
      ['Contraction "Don\'t"', "Do not"],
      ['Contraction "It\'s"', "It is"],
      ['Contraction "I\'m"', "I am"],
    ]);
  });

  test("never raises heuristic rules above warning", () => {
    const findings = check("Don't restart.", {
      rules: { grammar: { contractions: true } },
      severity: { contractions: "error" },
    });

    expect(findings.map((f) => f.severity)).toEqual(["warning"]);
  });

  test("reports passive voice and third-person references", () => {
    const findings = check("The file was deleted.\nThe user must sign in.", {
      rules: { grammar: { passiveVoice: true, directAddress: ["the user"] } },
    });

    expect(findings.map((f) => [f.ruleId, f.line, f.message])).toEqual([
      ["passive_voice", 1, 'Possible passive voice: "was deleted"'],
      ["direct_address", 2, 'Third-person reference "The user"'],
    ]);
  });

  test("reports anthropomorphic and ability-specific phrases", () => {
    const findings = check("When the system thinks it is done, see below.", {
      rules: {
        grammar: { anthropomorphism: ["the system thinks"], abilityNeutral: ["see below"] },
      },
    });

    expect(findings.map((f) => [f.ruleId, f.severity])).toEqual([
      ["anthropomorphism", "warning"],
      ["ability_neutral", "info"],
    ]);
  });

  test("reports heavy use of complex terms once", () => {
    const findings = check("Utilize the tool.\nLeverage it and utilize more.", {
      rules: { grammar: { complexTerms: ["utilize", "leverage"], complexThreshold: 2 } },
    });

    expect(findings.map((f) => [f.ruleId, f.line, f.message])).toEqual([
      ["complex_language", 1, "3 uses of complex terms (utilize, leverage)"],
    ]);
  });
});

describe("formatting rules", () => {
  test("reports disallowed inline styles", () => {
    const content = '<p style="color: red; margin: 0">Text</p>';

    expect(
      check(content, { rules: { formatting: { disallowedStyles: ["color"] } } }).map(
        (f) => f.message,
      ),
    ).toEqual(['Inline style sets "color"']);
    expect(
      check(content, { rules: { formatting: { disallowedStyles: ["*"] } } }).map(
        (f) => f.message,
      ),
    ).toEqual(['Inline style sets "color"', 'Inline style sets "margin"']);
  });

  test("reports curly and single quotes", () => {
    const findings = check("He said “hello” and 'bye'.", {
      rules: { formatting: { quotes: "double" } },
    });

    expect(findings.map((f) => [f.message, f.suggestion])).toEqual([
      ["Quoted text “hello” should use straight double quotes", '"hello"'],
      ["Quoted text 'bye' should use straight double quotes", '"bye"'],
    ]);
  });

  test("reports step keywords in bulleted lists", () => {
    const findings = check("- First, open the app\n- Then close it\n1. First numbered", {
      rules: { formatting: { stepKeywords: ["First", "Then"] } },
    });

    expect(findings.map((f) => [f.line, f.message])).toEqual([
      [1, 'Bulleted list item starts with the step keyword "first"'],
      [2, 'Bulleted list item starts with the step keyword "then"'],
    ]);
  });
});

describe("accessibility rules", () => {
  test("reports vague link text", () => {
    const findings = check(
      '<p>For details <a href="/x">Click here</a>.</p>\nSee [here](https://example.com).',
      { rules: { accessibility: { vagueLinkText: ["click here", "here"] } } },
    );

    expect(findings.map((f) => [f.line, f.message])).toEqual([
      [1, 'Link text "Click here" does not describe its target'],
      [2, 'Link text "here" does not describe its target'],
    ]);
  });

  test("reports images without alt text", () => {
    const findings = check('<p>A</p>\n<img src="a.png">\n<img src="b.png" alt="Diagram">', {
      rules: { accessibility: { imageAltText: true } },
    });

    expect(findings.map((f) => [f.line, f.message])).toEqual([
      [2, 'Image has no alt text: <img src="a.png">'],
    ]);
  });
});

describe("training rules", () => {
  const trainingRules = {
    rules: {
      training: {
        modulePattern: "^M\\d{2}-[a-z0-9-]+$",
        appliesTo: ["training/**"],
        requiredSections: ["Objectives"],
      },
    },
  };

  test("checks module file names", () => {
    expect(check("# Objectives", trainingRules, "training/M01-intro.md")).toEqual([]);

    const findings = check("# Objectives", trainingRules, "training/intro.md");
    expect(findings.map((f) => [f.ruleId, f.message])).toEqual([
      ["module_name", 'Module name "intro" does not match ^M\\d{2}-[a-z0-9-]+$'],
    ]);
  });

  test("skips files outside the training scope", () => {
    expect(check("# Other", trainingRules, "docs/guide.md")).toEqual([]);
  });

  test("checks pasted content as a training module", () => {
    const findings = check("# Other", trainingRules);

    expect(findings.map((f) => f.message)).toEqual([
      'Training module is missing the "Objectives" section',
    ]);
  });

  test("checks table of contents and code blocks", () => {
    const findings = check("Intro\n```\none\ntwo\nthree\n```", {
      rules: {
        training: {
          requireToc: true,
          codeTheme: { theme: "midnight", minLines: 2 },
          requireCodeLanguage: true,
        },
      },
    });

    expect(findings.map((f) => [f.ruleId, f.line, f.message])).toEqual([
      ["training_toc", 1, "Training module has no table of contents"],
      ["code_block_language", 2, "Code block has no language"],
      ["code_block_theme", 2, 'Code block of 3 lines does not use the "midnight" theme'],
    ]);
  });
});

describe("unknown rule families", () => {
  test("reports an info notice instead of failing", () => {
    const findings = check("Text", { rules: { spelling: {} } });

    expect(findings).toEqual([
      {
        ruleId: "unknown_rule_family",
        family: "engine",
        severity: "info",
        line: 1,
        message: 'Unknown rule family "spelling" in configuration was ignored',
      },
    ]);
  });
});
