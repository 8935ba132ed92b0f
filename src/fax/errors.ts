export type SessionState = 'unconnected' | 'connected' | 'authenticated';

/**
 * Raised when an operation is issued before the session reached the state it
 * needs. This is a caller defect, not a backend failure.
 */
export class SessionStateError extends Error {
  readonly name = 'SessionStateError';

  constructor(
    readonly operation: string,
    readonly state: SessionState,
  ) {
    super(`Cannot ${operation}: session is ${state}, must be authenticated`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
