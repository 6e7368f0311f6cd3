/**
 * Error codes for FingerprintStore operations.
 */
export type FingerprintStoreErrorCode =
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'ALREADY_PERSISTED';

/**
 * Error thrown when the fingerprint store cannot be read or written.
 */
export class FingerprintStoreError extends Error {
  constructor(
    message: string,
    public readonly code: FingerprintStoreErrorCode,
    public readonly filePath?: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'FingerprintStoreError';
    Object.setPrototypeOf(this, FingerprintStoreError.prototype);
  }
}
