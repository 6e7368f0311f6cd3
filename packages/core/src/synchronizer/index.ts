/**
 * Synchronizer - working tree → remote volume
 *
 * @module synchronizer
 */

export { Synchronizer, exitCodeFor, formatSummary } from './synchronizer';
export { SyncAbortedError, PersistFailedError } from './synchronizer.errors';
export type {
  SyncState,
  FileAction,
  FileReport,
  SyncOutcome,
  PlanEntry,
  SyncPlan,
  SynchronizerDependencies,
} from './synchronizer.types';
