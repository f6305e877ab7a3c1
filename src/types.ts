export type Severity = "error" | "warning" | "info";

export type FailThreshold = Severity | "none";

export type CalloutPurpose = "info" | "note" | "tip" | "warning";

export interface Heading {
  level: number;
  text: string;
}

export interface DocumentLine {
  /** 1-based line number in the original input. */
  number: number;
  raw: string;
  /** Text outside code regions with markup removed. */
  prose: string;
  heading?: Heading;
  /** True when every piece of text on the line sits inside a code region. */
  inCode: boolean;
  callout?: CalloutPurpose;
  list?: "ordered" | "unordered";
  /** True when a list item starts on this line. */
  listItem: boolean;
}

export interface CodeBlock {
  startLine: number;
  endLine: number;
  /** Lines of code inside the block, fences and wrapping tags excluded. */
  lineCount: number;
  language?: string;
  theme?: string;
}

export interface Callout {
  purpose: CalloutPurpose;
  line: number;
}

export interface Document {
  filePath?: string;
  format: "markup" | "text";
  /** Markup was present but could not be parsed cleanly. */
  degraded: boolean;
  lines: DocumentLine[];
  codeBlocks: CodeBlock[];
  callouts: Callout[];
  hasTocMarker: boolean;
}

export interface Finding {
  ruleId: string;
  family: string;
  severity: Severity;
  filePath?: string;
  line: number;
  message: string;
  suggestion?: string;
}

export interface ReportSummary {
  total: number;
  error: number;
  warning: number;
  info: number;
}

export interface Report {
  filePath?: string;
  findings: Finding[];
  summary: ReportSummary;
  failOn: FailThreshold;
}
