export type LedgerErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'STORAGE';

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
}

/** Bad user input. Nothing was written. */
export class ValidationError extends LedgerError {
  readonly code = 'VALIDATION';

  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends LedgerError {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: string, readonly id: string) {
    super(`${entity} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/** The storage medium could not be read or written. */
export class StorageError extends LedgerError {
  readonly code = 'STORAGE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}
