import type { SyncOutcome } from './synchronizer.types';

/**
 * The walk could not start (root missing or not a directory). The store was
 * not touched.
 */
export class SyncAbortedError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'SyncAbortedError';
    Object.setPrototypeOf(this, SyncAbortedError.prototype);
  }
}

/**
 * The walk finished but the store could not be written. The previously
 * persisted store is intact; `outcome` holds what the walk did.
 */
export class PersistFailedError extends Error {
  constructor(
    message: string,
    public readonly outcome: SyncOutcome,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PersistFailedError';
    Object.setPrototypeOf(this, PersistFailedError.prototype);
  }
}
