/**
 * Error categories surfaced by appship commands.
 * Every category is fatal: the command prints the message and exits with 1.
 */

export type ErrorCategory = 'prerequisite' | 'validation' | 'deployment' | 'config';

export class AppshipError extends Error {
  override name = 'AppshipError';

  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly hint?: string
  ) {
    super(message);
  }
}

/** az missing, Bicep unavailable, not logged in */
export class PrerequisiteError extends AppshipError {
  override name = 'PrerequisiteError';

  constructor(message: string, hint?: string) {
    super(message, 'prerequisite', hint);
  }
}

/** Parameters or template rejected before anything is deployed */
export class TemplateValidationError extends AppshipError {
  override name = 'TemplateValidationError';

  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message, 'validation');
  }
}

/** The provider failed to create, read or delete resources */
export class DeploymentError extends AppshipError {
  override name = 'DeploymentError';

  constructor(message: string, hint?: string) {
    super(message, 'deployment', hint);
  }
}

/** Bad environment variables or missing receipts */
export class ConfigError extends AppshipError {
  override name = 'ConfigError';

  constructor(message: string, hint?: string) {
    super(message, 'config', hint);
  }
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
