export { MemoryRemoteWriter } from './memory_remote_writer';
