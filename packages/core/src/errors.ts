import type { RadioState } from './types.js';

export type PhyStateErrorCode =
  | 'PRECONDITION_VIOLATION'
  | 'UNDEFINED_STATE_QUERY'
  | 'NON_MONOTONIC_TIME'
  | 'REENTRANT_TRANSITION'
  | 'INVALID_ARGUMENT';

/**
 * Raised when a caller drives the tracker into an impossible transition or
 * queries a state that has no defined answer. These are logic errors in the
 * calling layer; the simulation run is expected to stop.
 */
export class PhyStateError extends Error {
  constructor(
    message: string,
    public readonly code: PhyStateErrorCode,
    public readonly operation: string,
    public readonly currentState?: RadioState
  ) {
    super(message);
    this.name = 'PhyStateError';
  }
}
