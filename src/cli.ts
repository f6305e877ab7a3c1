#!/usr/bin/env tsx
import { parseArgs, type CliArgs } from "./args";
import { listRules } from "./catalog";
import { checkDocuments, shouldBlock, type DocumentInput } from "./checker";
import { DEFAULT_CONFIG_PATH, loadRuleConfig } from "./config";
import { errorMessage } from "./errors";
import {
  discoverDocuments,
  listStagedFiles,
  readDocuments,
  readStagedFile,
} from "./files";
import { createChildLogger } from "./logger";
import { applySeverityFilter, formatReports } from "./output";
import { toProjectPath } from "./paths";

const VERSION = "0.1.0";

const log = createChildLogger({ component: "cli" });

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  if (args.version) {
    console.log(VERSION);
    return;
  }

  if (args.listRules) {
    for (const rule of listRules()) {
      console.log(`${rule.id} - ${rule.title}`);
      console.log(`  family: ${rule.family}, default severity: ${rule.severity}`);
    }
    return;
  }

  const { config, error: configError } = await loadRuleConfig(
    args.config ?? process.env.STYLEGUIDE_CONFIG ?? DEFAULT_CONFIG_PATH,
  );
  if (configError) {
    console.error(`docstyle config: ${configError.message}`);
    for (const issue of configError.issues) {
      console.error(`  ${issue}`);
    }
  }

  const inputs = await loadInputs(args);
  log.debug({ files: inputs.length }, "checking documents");

  const reports = applySeverityFilter(
    await checkDocuments(inputs, config, { failOn: args.failOn }),
    args.severity,
  );

  console.log(formatReports(reports, args.format, { failOn: args.failOn }));

  if (shouldBlock(reports, args.failOn)) {
    process.exitCode = 1;
  }
}

async function loadInputs(args: CliArgs): Promise<DocumentInput[]> {
  const cwd = process.cwd();

  // Staged mode checks what will be committed, not the working tree.
  if (args.staged) {
    return readDocuments(await listStagedFiles(cwd), (filePath) =>
      readStagedFile(cwd, filePath),
    );
  }

  if (args.files.length > 0) {
    return readDocuments(args.files.map((filePath) => toProjectPath(filePath, cwd)));
  }

  return readDocuments(await discoverDocuments(cwd));
}

function printHelp(): void {
  console.log(`docstyle ${VERSION}

Usage:
  docstyle [options] [file...]
  docstyle --staged [options]
  docstyle --list-rules

With no files, every .xml, .html, .htm, .md and .txt file under the
current directory is checked.

Options:
  --severity <level>  Show findings at or above: error | warning | info (default: info)
  --format <mode>     Output format: text | json (default: text)
  --fail-on <level>   Exit 1 on findings at or above: error | warning | info | none (default: error)
  --config <file>     Rule file (default: $STYLEGUIDE_CONFIG or ${DEFAULT_CONFIG_PATH})
  --staged            Check documents staged in Git
  --list-rules        Show every rule with its default severity
  -h, --help          Show help
  -v, --version       Show version`);
}

main().catch((error: unknown) => {
  console.error(`docstyle error: ${errorMessage(error)}`);
  process.exit(2);
});
