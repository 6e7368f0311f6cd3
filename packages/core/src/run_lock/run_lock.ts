/**
 * RunLock Interface
 *
 * Guards the fingerprint store against two runs at once.
 *
 * @module run_lock
 */

export type RunLockInfo = {
  pid: number;
  hostname: string;
  /** ISO timestamp */
  acquiredAt: string;
};

export interface RunLock {
  /**
   * @throws RunLockError when another live run holds the lock
   */
  acquire(): Promise<void>;
  /** Idempotent */
  release(): Promise<void>;
}

export class RunLockError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder?: RunLockInfo
  ) {
    super(message);
    this.name = 'RunLockError';
    Object.setPrototypeOf(this, RunLockError.prototype);
  }
}
