/**
 * Custom Error Classes for autoheal
 */

/**
 * Error thrown when a configuration file cannot be read or fails validation
 */
export class ConfigurationError extends Error {
  public readonly configPath: string | null;
  public readonly issues: string[];

  constructor(message: string, configPath: string | null, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.configPath = configPath;
    this.issues = issues;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Error thrown when a model backend cannot be constructed
 * (missing credential, unusable endpoint)
 */
export class BackendInitializationError extends Error {
  public readonly backend: string;
  public readonly reason: string;

  constructor(backend: string, reason: string) {
    super(`Failed to initialize ${backend} backend: ${reason}`);
    this.name = 'BackendInitializationError';
    this.backend = backend;
    this.reason = reason;
  }
}

/**
 * Error thrown when a rewritten source file no longer parses
 */
export class RewriteVerificationError extends Error {
  public readonly file: string;
  public readonly line: number;

  constructor(file: string, line: number, parserMessage: string) {
    super(`Rewrite of ${file} does not parse (line ${line}): ${parserMessage}`);
    this.name = 'RewriteVerificationError';
    this.file = file;
    this.line = line;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
