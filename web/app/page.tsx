"use client";

import { FormEvent, useEffect, useState } from "react";
import type {
    FailThreshold,
    Finding,
    ReportSummary,
    Severity,
} from "../../src/types";

type RuleInfo = {
    id: string;
    family: string;
    severity: Severity;
    title: string;
};

type CheckResponse = {
    findings: Finding[];
    summary: ReportSummary;
    shouldBlock: boolean;
    failOn: FailThreshold;
    configError: string | null;
    error?: string;
};

const SEVERITIES: readonly Severity[] = ["error", "warning", "info"];
const FAIL_THRESHOLDS: readonly FailThreshold[] = ["error", "warning", "info", "none"];

const GROUP_LABELS: Record<Severity, string> = {
    error: "Errors",
    warning: "Warnings",
    info: "Info",
};

const sampleContent = `<h1>How To Configure The Node</h1>
<p>Refer to KB-123 before you start.</p>
<p>The user's workstation must be whitelisted. Contact admin@example.com for access.</p>
<pre class="language-bash">ssh admin@example.com</pre>`;

export default function Home() {
    const apiBase = process.env.NEXT_PUBLIC_DOCSTYLE_API_URL?.replace(/\/$/, "") ?? "";

    const [ruleCount, setRuleCount] = useState<number | null>(null);
    const [severity, setSeverity] = useState<Severity>("info");
    const [failOn, setFailOn] = useState<FailThreshold>("error");
    const [content, setContent] = useState("");
    const [summary, setSummary] = useState<ReportSummary | null>(null);
    const [findings, setFindings] = useState<Finding[]>([]);
    const [status, setStatus] = useState("Awaiting input.");
    const [isLoading, setIsLoading] = useState(false);

    useEffect(() => {
        async function loadRules(): Promise<void> {
            try {
                const response = await fetch(`${apiBase}/api/rules`);
                if (!response.ok) {
                    throw new Error("Failed to load rules");
                }
                const data: { rules: RuleInfo[] } = await response.json();
                setRuleCount(data.rules.length);
            } catch {
                setRuleCount(null);
            }
        }

        void loadRules();
    }, [apiBase]);

    async function onSubmit(event: FormEvent<HTMLFormElement>) {
        event.preventDefault();

        if (!content.trim()) {
            setStatus("Paste some content first.");
            return;
        }

        setIsLoading(true);
        setStatus("Checking…");

        try {
            const response = await fetch(`${apiBase}/api/check`, {
                method: "POST",
                headers: {
                    "content-type": "application/json",
                },
                body: JSON.stringify({ content, severity, failOn }),
            });

            const data: CheckResponse = await response.json();
            if (!response.ok) {
                throw new Error(data.error || "Check failed");
            }

            setSummary(data.summary);
            setFindings(data.findings);
            const verdict = data.shouldBlock ? "BLOCK" : "PASS";
            setStatus(
                data.configError
                    ? `${verdict} · fail-on:${data.failOn} · config: ${data.configError}`
                    : `${verdict} · fail-on:${data.failOn}`,
            );
        } catch (error) {
            setStatus(error instanceof Error ? error.message : "Check failed");
            setSummary(null);
            setFindings([]);
        } finally {
            setIsLoading(false);
        }
    }

    return (
        <div className="page-wrapper">
            <header className="hero">
                <p className="eyebrow">Documentation style checks</p>
                <h1>
                    docstyle
                    <span>
                        Check articles and training modules against the style
                        guide before they are published.
                    </span>
                </h1>
                {ruleCount !== null ? (
                    <p className="rule-count">{ruleCount} rules available</p>
                ) : null}
            </header>

            <main className="layout">
                <section className="panel">
                    <div className="panel-head">
                        <h2>Paste content</h2>
                        <p>XML, HTML or plain text. Findings report line numbers only.</p>
                    </div>

                    <form className="check-form" onSubmit={onSubmit}>
                        <label htmlFor="severity">Show findings at or above</label>
                        <select
                            id="severity"
                            name="severity"
                            value={severity}
                            onChange={(event) => {
                                const next = SEVERITIES.find(
                                    (level) => level === event.target.value,
                                );
                                if (next) {
                                    setSeverity(next);
                                }
                            }}
                        >
                            {SEVERITIES.map((level) => (
                                <option key={level} value={level}>
                                    {level}
                                </option>
                            ))}
                        </select>

                        <label htmlFor="failOn">Block on</label>
                        <select
                            id="failOn"
                            name="failOn"
                            value={failOn}
                            onChange={(event) => {
                                const next = FAIL_THRESHOLDS.find(
                                    (level) => level === event.target.value,
                                );
                                if (next) {
                                    setFailOn(next);
                                }
                            }}
                        >
                            {FAIL_THRESHOLDS.map((level) => (
                                <option key={level} value={level}>
                                    {level === "none" ? "none (report only)" : level}
                                </option>
                            ))}
                        </select>

                        <label htmlFor="content">Document</label>
                        <textarea
                            id="content"
                            name="content"
                            spellCheck={false}
                            required
                            value={content}
                            onChange={(event) => setContent(event.target.value)}
                        />

                        <div className="actions">
                            <button type="submit" disabled={isLoading}>
                                {isLoading ? "Checking…" : "Check"}
                            </button>
                            <button
                                type="button"
                                className="ghost"
                                onClick={() => setContent(sampleContent)}
                                disabled={isLoading}
                            >
                                Load sample
                            </button>
                        </div>
                    </form>
                </section>

                <section className="panel">
                    <div className="panel-head">
                        <h2>Findings</h2>
                        <p>{status}</p>
                    </div>

                    {summary ? (
                        <div className="summary">
                            <div className="summary-item">
                                <strong>{summary.total}</strong>
                                <span>total</span>
                            </div>
                            {SEVERITIES.map((level) => (
                                <div key={level} className={`summary-item ${level}`}>
                                    <strong>{summary[level]}</strong>
                                    <span>{level}</span>
                                </div>
                            ))}
                        </div>
                    ) : null}

                    {findings.length === 0 ? (
                        <div className="empty">No findings yet.</div>
                    ) : (
                        SEVERITIES.map((level) => {
                            const group = findings.filter(
                                (finding) => finding.severity === level,
                            );
                            if (group.length === 0) {
                                return null;
                            }

                            return (
                                <div key={level} className="group">
                                    <h3>
                                        {GROUP_LABELS[level]} ({group.length})
                                    </h3>
                                    {group.map((finding) => (
                                        <article
                                            key={`${finding.ruleId}-${finding.line}-${finding.message}`}
                                            className={`finding ${finding.severity}`}
                                        >
                                            <h4>{finding.message}</h4>
                                            <div className="meta">
                                                line {finding.line} · {finding.ruleId}
                                            </div>
                                            {finding.suggestion ? (
                                                <div className="suggestion">
                                                    Suggestion: {finding.suggestion}
                                                </div>
                                            ) : null}
                                        </article>
                                    ))}
                                </div>
                            );
                        })
                    )}
                </section>
            </main>
        </div>
    );
}
