/**
 * Protocol Errors
 *
 * Expected failures (a bad proof, an illegal transition, a wrong preimage) are
 * returned as values. ProtocolError is thrown only where a promise has nothing
 * meaningful to resolve with: cancelled mining, worker timeouts, misconfiguration.
 */

export type ProtocolErrorCode =
  | 'ABORTED'
  | 'WORKER_TIMEOUT'
  | 'WORKER_UNAVAILABLE'
  | 'INVALID_KEY'
  | 'INVALID_CONFIG'
  | 'STORAGE_CORRUPT'
  | 'NOT_FOUND'
  | 'PROOF_UNAVAILABLE'
  | 'PAYMENT_FAILED';

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof ProtocolError && err.code === 'ABORTED';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Result of an operation whose failures are part of the protocol.
 */
export type Outcome<T, E extends string> =
  | { success: true; value: T }
  | { success: false; error: E; message: string };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends string>(error: E, message: string): { success: false; error: E; message: string } {
  return { success: false, error, message };
}
