import type { Rejection, RejectionReason } from './models';

/**
 * A planet or galaxy broke its own capability matrix or referenced
 * something that does not exist. Fatal: the run cannot continue.
 */
export class StructuralInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StructuralInvariantError';
  }
}

/** The control surface was used out of order (e.g. tick before start). */
export class SimulationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationStateError';
  }
}

export function reject(error: RejectionReason, message: string): Rejection {
  return { success: false, error, message };
}
