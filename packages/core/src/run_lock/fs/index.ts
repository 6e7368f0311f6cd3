export { FsRunLock, isProcessAlive } from './fs_run_lock';
export type { FsRunLockOptions } from './fs_run_lock';
