import type { ChangeKind } from '../change_detector';
import type { FingerprintStore } from '../fingerprint_store';
import type { RemoteWriter, RemoteWriterErrorCode } from '../remote_writer';
import type { WorkingTree } from '../working_tree';
import type { Logger } from '../logger';

/**
 * idle → walking → persisting → done, or → aborted from walking/persisting.
 */
export type SyncState = 'idle' | 'walking' | 'persisting' | 'done' | 'aborted';

export type FileAction = 'uploaded' | 'skipped' | 'failed';

export type FileReport = {
  path: string;
  action: FileAction;
  /** Absent when the file could not be read */
  change?: ChangeKind;
  error?: string;
  code?: RemoteWriterErrorCode;
};

/**
 * Counters for one run; uploaded + skipped + failed = files visited.
 */
export type SyncOutcome = {
  uploaded: number;
  skipped: number;
  failed: number;
  files: FileReport[];
};

export type PlanEntry = {
  path: string;
  change?: ChangeKind;
  fingerprint?: string;
  error?: string;
};

/**
 * Result of a dry run: what run() would upload or skip.
 */
export type SyncPlan = {
  entries: PlanEntry[];
  new: number;
  changed: number;
  unchanged: number;
  unreadable: number;
};

export type SynchronizerDependencies = {
  tree: WorkingTree;
  store: FingerprintStore;
  writer: RemoteWriter;
  logger?: Logger;
  /**
   * Revert the pending fingerprint of a failed upload so the next run
   * retries it. Default false: the fingerprint is recorded regardless.
   */
  retryFailedUploads?: boolean;
};
