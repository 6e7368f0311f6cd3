/**
 * RemoteWriter Interface
 *
 * Abstraction over "persist these bytes at this remote path" with
 * create-or-replace semantics. Per-file failures are reported as results,
 * never thrown, so one bad file cannot stop a walk.
 *
 * @module remote_writer
 */

/**
 * Error codes for failed uploads.
 */
export type RemoteWriterErrorCode =
  | 'READ_ERROR'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR';

/**
 * Outcome of a single upload.
 */
export type UploadResult =
  | { success: true; status?: number }
  | {
    success: false;
    code: RemoteWriterErrorCode;
    /** Human-readable cause */
    error: string;
    /** HTTP status when the server answered */
    status?: number;
  };

/**
 * Interface for writing local files to the remote volume.
 *
 * Implementations:
 * - HttpRemoteWriter: Files API over HTTP (PUT, bearer token)
 * - MemoryRemoteWriter: in-memory, for tests
 */
export interface RemoteWriter {
  /**
   * Uploads the full content of `localPath` to `remoteRelativePath` under the
   * writer's base location, replacing any existing remote file.
   */
  upload(localPath: string, remoteRelativePath: string): Promise<UploadResult>;
}

/**
 * Error raised when a writer is constructed with unusable settings.
 */
export class RemoteWriterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RemoteWriterError';
    Object.setPrototypeOf(this, RemoteWriterError.prototype);
  }
}
