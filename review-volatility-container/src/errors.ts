/**
 * Error types raised across the pipeline.
 *
 * A ConfigurationError aborts the whole run; the others are caught per app.
 */

export class ConfigurationError extends Error {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid configuration in ${filePath}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

export class ReviewSourceError extends Error {
  readonly appUrl: string;
  readonly attempts: number;

  constructor(appUrl: string, attempts: number, message: string) {
    super(`Review fetch failed for ${appUrl} after ${attempts} attempt(s): ${message}`);
    this.name = 'ReviewSourceError';
    this.appUrl = appUrl;
    this.attempts = attempts;
  }
}

export class NarrativeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NarrativeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
