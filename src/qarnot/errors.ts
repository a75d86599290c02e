/**
 * Failure categories surfaced to tool callers
 */
export type QarnotErrorCode =
  | 'not_found'
  | 'invalid_state'
  | 'unauthorized'
  | 'io'
  | 'configuration'
  | 'service';

/**
 * QarnotError - Typed failure raised by the compute and storage clients
 */
export class QarnotError extends Error {
  /** Stable category used to build tool errors. */
  readonly code: QarnotErrorCode;
  /** HTTP status of the failed request, when there was one. */
  readonly status?: number;

  constructor(code: QarnotErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'QarnotError';
    this.code = code;
    this.status = options.status;
  }
}

export function isQarnotError(error: unknown): error is QarnotError {
  return error instanceof QarnotError;
}

/**
 * Maps an HTTP status from the compute API to an error category
 */
export function codeForStatus(status: number): QarnotErrorCode {
  switch (status) {
    case 401:
    case 403:
      return 'unauthorized';
    case 404:
      return 'not_found';
    case 409:
      return 'invalid_state';
    default:
      return 'service';
  }
}
