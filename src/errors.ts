import type { ZodError } from 'zod';

export type DocsiftErrorCode =
  | 'IO_ERROR'
  | 'INDEX_NOT_READY'
  | 'INVALID_REQUEST'
  | 'INVALID_SETTINGS';

/**
 * Base class for every error the engine raises on purpose
 */
export abstract class DocsiftError extends Error {
  abstract readonly code: DocsiftErrorCode;
  readonly retryable: boolean = false;
}

/**
 * A file or directory of the corpus could not be read
 */
export class IOError extends DocsiftError {
  readonly code = 'IO_ERROR';

  constructor(
    readonly path: string,
    readonly reason: unknown
  ) {
    super(`Cannot read ${path}: ${describeCause(reason)}`);
    this.name = 'IOError';
  }
}

/**
 * A query arrived before the first successful corpus load.
 * Callers may retry once loading completes.
 */
export class IndexNotReadyError extends DocsiftError {
  readonly code = 'INDEX_NOT_READY';
  readonly retryable = true;

  constructor() {
    super('Corpus has not been loaded yet');
    this.name = 'IndexNotReadyError';
  }
}

export class InvalidRequestError extends DocsiftError {
  readonly code = 'INVALID_REQUEST';

  constructor(readonly issues: string[]) {
    super(`Invalid retrieval request: ${issues.join('; ')}`);
    this.name = 'InvalidRequestError';
  }

  static fromZod(error: ZodError): InvalidRequestError {
    return new InvalidRequestError(formatIssues(error));
  }
}

export class InvalidSettingsError extends DocsiftError {
  readonly code = 'INVALID_SETTINGS';

  constructor(readonly issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'InvalidSettingsError';
  }

  static fromZod(error: ZodError): InvalidSettingsError {
    return new InvalidSettingsError(formatIssues(error));
  }
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
