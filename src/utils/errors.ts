/**
 * Error types shared by services and the HTTP layer
 */

export type BackfillErrorCode =
  | 'JOB_NOT_FOUND'
  | 'JOB_NOT_RESUMABLE'
  | 'SOURCE_NOT_CONFIGURED';

export class BackfillError extends Error {
  readonly code: BackfillErrorCode;

  constructor(code: BackfillErrorCode, message: string) {
    super(message);
    this.name = 'BackfillError';
    this.code = code;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
