/**
 * Error Taxonomy
 *
 * ConfigurationError  - startup is impossible (missing credential)
 * BackendUnavailable  - the backend could not be reached or timed out
 * SchemaViolation     - the backend answered with data breaking the output contract
 * UserInterrupt       - the user asked to stop; not a failure
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class BackendUnavailable extends Error {
  /** HTTP status reported by the backend, when there was a response at all */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'BackendUnavailable';
    this.status = options.status;
  }
}

export class SchemaViolation extends Error {
  readonly schemaName: string;
  /** One entry per failed check, formatted as "path: message" */
  readonly issues: string[];

  constructor(schemaName: string, issues: string[]) {
    super(`${schemaName} failed validation: ${issues.join('; ')}`);
    this.name = 'SchemaViolation';
    this.schemaName = schemaName;
    this.issues = issues;
  }
}

export class UserInterrupt extends Error {
  constructor(message = 'Interrupted by user') {
    super(message);
    this.name = 'UserInterrupt';
  }
}

/**
 * Errors a delegated call may end with that are reported back to the user
 * instead of ending the session.
 */
export function isDelegationError(error: unknown): error is BackendUnavailable | SchemaViolation {
  return error instanceof BackendUnavailable || error instanceof SchemaViolation;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
