/**
 * Error types for the two failure paths that propagate:
 * configuration problems at startup and store operations.
 * Everything else degrades to a default inside its stage.
 */

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export class StoreError extends Error {
  readonly code: string | undefined;
  readonly operation: string;

  constructor(operation: string, message: string, code?: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'StoreError';
    this.operation = operation;
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
