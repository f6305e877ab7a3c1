import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { promisify } from "node:util";
import fg from "fast-glob";
import type { DocumentInput } from "./checker";
import { UsageError } from "./errors";
import { normalizePath } from "./paths";

const execFileAsync = promisify(execFile);

export const DOCUMENT_EXTENSIONS = ["xml", "html", "htm", "md", "txt"] as const;

const DOCUMENT_PATTERN = new RegExp(`\\.(?:${DOCUMENT_EXTENSIONS.join("|")})$`, "i");

export function isDocumentPath(filePath: string): boolean {
  return DOCUMENT_PATTERN.test(filePath);
}

export type ContentReader = (filePath: string) => Promise<string>;

export const readWorkingTreeFile: ContentReader = async (filePath) => {
  if (!existsSync(filePath)) {
    throw new UsageError(`File not found: ${filePath}`);
  }

  return readFile(filePath, "utf8");
};

export async function readDocuments(
  files: readonly string[],
  read: ContentReader = readWorkingTreeFile,
): Promise<DocumentInput[]> {
  return Promise.all(
    files.map(async (filePath) => ({ filePath, content: await read(filePath) })),
  );
}

/** Every document under `cwd`, sorted so runs list files in a stable order. */
export async function discoverDocuments(cwd: string): Promise<string[]> {
  const files = await fg(`**/*.{${DOCUMENT_EXTENSIONS.join(",")}}`, {
    cwd,
    dot: false,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/.git/**", "**/dist/**"],
  });

  return files.sort();
}

/** Added, copied or modified documents in the Git index, relative to `cwd`. */
export async function listStagedFiles(cwd: string): Promise<string[]> {
  try {
    const { stdout } = await execFileAsync(
      "git",
      ["diff", "--cached", "--name-only", "--relative", "--diff-filter=ACM"],
      { cwd },
    );

    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map(normalizePath)
      .filter(isDocumentPath);
  } catch (error: unknown) {
    throw new Error(`git diff failed: ${gitErrorDetail(error)}`);
  }
}

/** The staged copy of `filePath`, which may differ from the working tree. */
export async function readStagedFile(cwd: string, filePath: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync("git", ["show", `:./${filePath}`], {
      cwd,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  } catch (error: unknown) {
    throw new Error(`git show failed for ${filePath}: ${gitErrorDetail(error)}`);
  }
}

function gitErrorDetail(error: unknown): string {
  const detail =
    error instanceof Error && "stderr" in error && typeof error.stderr === "string"
      ? error.stderr.trim()
      : "";
  return detail || "unknown error";
}
