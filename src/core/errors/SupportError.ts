/**
 * Support error taxonomy.
 * Every failure leaving the store, the analytics engine or the API facade is one
 * of these, discriminated by `code` so callers never match on message text.
 */
export type SupportErrorCode =
  | 'STORAGE_FAILURE'
  | 'TICKET_NOT_FOUND'
  | 'INVALID_INPUT'
  | 'VALIDATION_FAILURE'
  | 'UNAUTHORIZED'
  | 'INTERNAL_FAILURE';

export abstract class SupportError extends Error {
  abstract readonly code: SupportErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connectivity, constraint or backend failure. Not recoverable locally.
 * `driverCode` carries the MySQL error code (e.g. ER_NO_REFERENCED_ROW_2) when known.
 */
export class StorageFailureError extends SupportError {
  readonly code = 'STORAGE_FAILURE';
  readonly driverCode?: string;

  constructor(message: string, options?: { cause?: unknown; driverCode?: string }) {
    super(`Database error: ${message}`, { cause: options?.cause });
    this.driverCode = options?.driverCode;
  }
}

export class TicketNotFoundError extends SupportError {
  readonly code = 'TICKET_NOT_FOUND';

  constructor(public readonly ticketId: string) {
    super(`Ticket not found: ${ticketId}`);
  }
}

export class InvalidInputError extends SupportError {
  readonly code = 'INVALID_INPUT';

  constructor(public readonly reason: string) {
    super(`Invalid input: ${reason}`);
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class ValidationFailureError extends SupportError {
  readonly code = 'VALIDATION_FAILURE';

  constructor(
    public readonly reason: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(`Validation error: ${reason}`);
  }
}

/**
 * Reserved for embedding services that surface their own authorization
 * decisions through the same taxonomy. Nothing in this package raises it.
 */
export class UnauthorizedError extends SupportError {
  readonly code = 'UNAUTHORIZED';

  constructor() {
    super('Unauthorized');
  }
}

export class InternalFailureError extends SupportError {
  readonly code = 'INTERNAL_FAILURE';

  constructor(public readonly reason: string) {
    super(`Internal error: ${reason}`);
  }
}

export function isSupportError(error: unknown): error is SupportError {
  return error instanceof SupportError;
}
