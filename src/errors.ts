/**
 * The rule file could not be used as written. Checking continues with
 * whatever part of the configuration survived.
 */
export class ConfigurationError extends Error {
  readonly configPath?: string;
  readonly issues: string[];

  constructor(message: string, options: { configPath?: string; issues?: string[] } = {}) {
    super(message);
    this.name = "ConfigurationError";
    this.configPath = options.configPath;
    this.issues = options.issues ?? [];
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
