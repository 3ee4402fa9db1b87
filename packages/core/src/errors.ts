export type ErrorCode = 'NOT_FOUND' | 'INVALID_STATE' | 'UNREACHABLE' | 'IO_FAILURE' | 'BAD_REQUEST';

/**
 * Base class for every error the core surfaces to a caller.
 * None of them is fatal to the process.
 */
export abstract class LanbeamError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown peer or transfer id */
export class NotFoundError extends LanbeamError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

/** Transition not allowed from the current status */
export class InvalidStateError extends LanbeamError {
  readonly code = 'INVALID_STATE';
  readonly statusCode = 409;
}

/** Remote RPC failed or timed out */
export class UnreachableError extends LanbeamError {
  readonly code = 'UNREACHABLE';
  readonly statusCode = 502;
}

/** Staging read or write failed */
export class IOFailureError extends LanbeamError {
  readonly code = 'IO_FAILURE';
  readonly statusCode = 500;
}

/** Malformed request body */
export class BadRequestError extends LanbeamError {
  readonly code = 'BAD_REQUEST';
  readonly statusCode = 400;
}

export function isLanbeamError(error: unknown): error is LanbeamError {
  return error instanceof LanbeamError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rebuild an error reported by a remote node's JSON error body
 */
export function errorFromCode(code: unknown, message: string): LanbeamError {
  switch (code) {
    case 'NOT_FOUND':
      return new NotFoundError(message);
    case 'INVALID_STATE':
      return new InvalidStateError(message);
    case 'IO_FAILURE':
      return new IOFailureError(message);
    case 'BAD_REQUEST':
      return new BadRequestError(message);
    default:
      return new UnreachableError(message);
  }
}
