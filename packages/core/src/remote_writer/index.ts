/**
 * RemoteWriter - object-storage write abstraction
 *
 * @module remote_writer
 */

export type { RemoteWriter, UploadResult, RemoteWriterErrorCode } from './remote_writer';
export { RemoteWriterError } from './remote_writer';
export {
  HttpRemoteWriter,
  encodeRemotePath,
} from './http';
export type { HttpRemoteWriterOptions, FetchFn } from './http';
export { MemoryRemoteWriter } from './memory';
