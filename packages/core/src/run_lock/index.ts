export type { RunLock, RunLockInfo } from './run_lock';
export { RunLockError } from './run_lock';
export { FsRunLock, isProcessAlive } from './fs';
export type { FsRunLockOptions } from './fs';
