export {
  HttpRemoteWriter,
  encodeRemotePath,
} from './http_remote_writer';
export type { HttpRemoteWriterOptions, FetchFn } from './http_remote_writer';
