/**
 * Look store error types
 */

export type LookStoreErrorCode = 'VALIDATION' | 'IMPORT' | 'PERSISTENCE' | 'PARSE';

export class LookStoreError extends Error {
  readonly code: LookStoreErrorCode;

  constructor(code: LookStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LookStoreError';
    this.code = code;
  }
}

/**
 * A record failed its required-field checks at creation.
 */
export class ValidationError extends LookStoreError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export interface ImportIssue {
  index: number;    // -1 when the whole payload is unusable
  message: string;
}

/**
 * The import payload was rejected as a whole.
 */
export class ImportError extends LookStoreError {
  readonly issues: ImportIssue[];

  constructor(message: string, issues: ImportIssue[] = []) {
    super('IMPORT', message);
    this.name = 'ImportError';
    this.issues = issues;
  }
}

/**
 * The durable write failed. In-memory state is kept.
 */
export class PersistenceError extends LookStoreError {
  readonly quotaExceeded: boolean;

  constructor(message: string, options: { cause?: unknown; quotaExceeded?: boolean } = {}) {
    super('PERSISTENCE', message, { cause: options.cause });
    this.name = 'PersistenceError';
    this.quotaExceeded = options.quotaExceeded ?? false;
  }
}

/**
 * The persisted collection could not be read. Only ever logged.
 */
export class ParseError extends LookStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE', message, options);
    this.name = 'ParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
