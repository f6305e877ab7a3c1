import { describe, expect, test } from "vitest";
import {
  applySeverityFilter,
  combineSummaries,
  formatJsonReport,
  formatTextReport,
} from "../src/output";
import type { Report } from "../src/types";

const report: Report = {
  filePath: "docs/a.md",
  findings: [
    {
      ruleId: "pii_email",
      family: "pii",
      severity: "error",
      filePath: "docs/a.md",
      line: 3,
      message: 'Possible e-mail address "x@corp.test"',
      suggestion: "Remove the address",
    },
    {
      ruleId: "heading_case",
      family: "headings",
      severity: "warning",
      filePath: "docs/a.md",
      line: 1,
      message: 'Heading "A B" is not in sentence case',
      suggestion: "A b",
    },
    {
      ruleId: "passive_voice",
      family: "grammar",
      severity: "info",
      filePath: "docs/a.md",
      line: 4,
      message: 'Possible passive voice: "was made"',
    },
  ],
  summary: { total: 3, error: 1, warning: 1, info: 1 },
  failOn: "error",
};

const pasted: Report = {
  findings: [
    {
      ruleId: "kb_reference_format",
      family: "references",
      severity: "info",
      line: 2,
      message: 'KB reference "KB-1" does not use the form KB-####',
    },
  ],
  summary: { total: 1, error: 0, warning: 0, info: 1 },
  failOn: "error",
};

describe("formatTextReport", () => {
  test("groups findings by severity", () => {
    expect(formatTextReport([report])).toBe(
      [
        "Documentation style findings",
        "",
        "Errors (1)",
        '  docs/a.md:3  Possible e-mail address "x@corp.test" [pii_email]',
        "    suggestion: Remove the address",
        "",
        "Warnings (1)",
        '  docs/a.md:1  Heading "A B" is not in sentence case [heading_case]',
        "    suggestion: A b",
        "",
        "Info (1)",
        '  docs/a.md:4  Possible passive voice: "was made" [passive_voice]',
        "",
        "Summary: files=1, total=3, error=1, warning=1, info=1",
      ].join("\n"),
    );
  });

  test("applies the minimum severity", () => {
    expect(formatTextReport([report], { minSeverity: "error" })).toBe(
      [
        "Documentation style findings",
        "",
        "Errors (1)",
        '  docs/a.md:3  Possible e-mail address "x@corp.test" [pii_email]',
        "    suggestion: Remove the address",
        "",
        "Summary: files=1, total=1, error=1, warning=0, info=0",
      ].join("\n"),
    );
  });

  test("reports line-only locations for pasted content", () => {
    expect(formatTextReport([pasted]).split("\n")[3]).toBe(
      '  line 2  KB reference "KB-1" does not use the form KB-#### [kb_reference_format]',
    );
  });

  test("prints a short message when nothing is left", () => {
    expect(formatTextReport([pasted], { minSeverity: "warning" })).toBe(
      "No style issues found.",
    );
    expect(formatTextReport([])).toBe("No style issues found.");
  });
});

describe("formatJsonReport", () => {
  test("returns findings, summary and file count", () => {
    const parsed: unknown = JSON.parse(formatJsonReport([report, pasted], { minSeverity: "warning" }));

    expect(parsed).toEqual({
      findings: [report.findings[0], report.findings[1]],
      summary: { total: 2, error: 1, warning: 1, info: 0 },
      files: 2,
      failOn: "error",
      shouldBlock: true,
    });
  });

  test("reports the exit decision for the given threshold", () => {
    const reportOnly: unknown = JSON.parse(formatJsonReport([report], { failOn: "none" }));
    const strict: unknown = JSON.parse(formatJsonReport([pasted], { failOn: "info" }));
    const filtered: unknown = JSON.parse(
      formatJsonReport([pasted], { minSeverity: "warning", failOn: "info" }),
    );

    expect(reportOnly).toMatchObject({ failOn: "none", shouldBlock: false });
    expect(strict).toMatchObject({ failOn: "info", shouldBlock: true });
    expect(filtered).toMatchObject({ failOn: "info", shouldBlock: false });
  });
});

describe("applySeverityFilter", () => {
  test("recounts the summary of each report", () => {
    const [filtered] = applySeverityFilter([report], "warning");

    expect(filtered.findings.map((f) => f.ruleId)).toEqual(["pii_email", "heading_case"]);
    expect(filtered.summary).toEqual({ total: 2, error: 1, warning: 1, info: 0 });
    expect(filtered.failOn).toBe("error");
  });
});

describe("combineSummaries", () => {
  test("adds up the counts of every report", () => {
    expect(combineSummaries([report, pasted])).toEqual({
      total: 4,
      error: 1,
      warning: 1,
      info: 2,
    });
  });
});
