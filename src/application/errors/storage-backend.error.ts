export type StorageOperation = 'ListObjects' | 'ProbeBucket';

export class StorageBackendError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly operation: StorageOperation,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageBackendError';
  }

  get isAccessDenied(): boolean {
    return this.code === 'AccessDenied';
  }
}

export class StorageTimeoutError extends StorageBackendError {
  constructor(
    operation: StorageOperation,
    readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(
      `${operation} request timed out after ${timeoutMs}ms`,
      'RequestTimeout',
      operation,
      undefined,
      options,
    );
    this.name = 'StorageTimeoutError';
  }
}
