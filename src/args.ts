import { UsageError } from "./errors";
import type { OutputFormat } from "./output";
import type { FailThreshold, Severity } from "./types";

export interface CliArgs {
  files: string[];
  severity: Severity;
  format: OutputFormat;
  failOn: FailThreshold;
  config?: string;
  staged: boolean;
  listRules: boolean;
  help: boolean;
  version: boolean;
}

const SEVERITIES: readonly Severity[] = ["error", "warning", "info"];
const FAIL_THRESHOLDS: readonly FailThreshold[] = ["error", "warning", "info", "none"];

export function parseArgs(raw: readonly string[]): CliArgs {
  const args: CliArgs = {
    files: [],
    severity: "info",
    format: "text",
    failOn: "error",
    staged: false,
    listRules: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < raw.length; i += 1) {
    const arg = raw[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    if (arg === "--version" || arg === "-v") {
      args.version = true;
      continue;
    }

    if (arg === "--staged") {
      args.staged = true;
      continue;
    }

    if (arg === "--list-rules") {
      args.listRules = true;
      continue;
    }

    if (arg === "--severity") {
      const value = SEVERITIES.find((level) => level === raw[i + 1]);
      if (!value) {
        throw new UsageError("--severity must be one of: error, warning, info");
      }
      args.severity = value;
      i += 1;
      continue;
    }

    if (arg === "--format") {
      const value = raw[i + 1];
      if (value !== "text" && value !== "json") {
        throw new UsageError("--format must be 'text' or 'json'");
      }
      args.format = value;
      i += 1;
      continue;
    }

    if (arg === "--fail-on") {
      const value = FAIL_THRESHOLDS.find((level) => level === raw[i + 1]);
      if (!value) {
        throw new UsageError("--fail-on must be one of: error, warning, info, none");
      }
      args.failOn = value;
      i += 1;
      continue;
    }

    if (arg === "--config") {
      const value = raw[i + 1];
      if (!value) {
        throw new UsageError("--config requires a file path");
      }
      args.config = value;
      i += 1;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    args.files.push(arg);
  }

  if (args.staged && args.files.length > 0) {
    throw new UsageError("--staged cannot be combined with explicit files");
  }

  return args;
}
