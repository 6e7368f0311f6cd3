/**
 * Synchronizer - one pass over the working tree
 *
 * Sequentially fingerprints every file, uploads the new and changed ones and
 * skips the rest, then persists the fingerprints seen in this pass. Per-file
 * failures are counted; only an unlistable tree or an unwritable store stops
 * the run.
 *
 * @module synchronizer
 */

import { classifyChange, computeFingerprint } from '../change_detector';
import type { FingerprintStore } from '../fingerprint_store';
import type { RemoteWriter, UploadResult } from '../remote_writer';
import type { WorkingTree } from '../working_tree';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { SyncAbortedError, PersistFailedError } from './synchronizer.errors';
import type {
  SyncState,
  SyncOutcome,
  SyncPlan,
  PlanEntry,
  SynchronizerDependencies,
} from './synchronizer.types';

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * `Uploaded: N | Skipped: N | Failed: N`
 */
export function formatSummary(outcome: Pick<SyncOutcome, 'uploaded' | 'skipped' | 'failed'>): string {
  return `Uploaded: ${outcome.uploaded} | Skipped: ${outcome.skipped} | Failed: ${outcome.failed}`;
}

/**
 * 0 when every visited file was uploaded or skipped, 1 otherwise.
 */
export function exitCodeFor(outcome: Pick<SyncOutcome, 'failed'>): number {
  return outcome.failed === 0 ? 0 : 1;
}

export class Synchronizer {
  private readonly tree: WorkingTree;
  private readonly store: FingerprintStore;
  private readonly writer: RemoteWriter;
  private readonly logger: Logger;
  private readonly retryFailedUploads: boolean;
  private _state: SyncState = 'idle';

  constructor(dependencies: SynchronizerDependencies) {
    this.tree = dependencies.tree;
    this.store = dependencies.store;
    this.writer = dependencies.writer;
    this.logger = dependencies.logger ?? createLogger('[Synchronizer] ');
    this.retryFailedUploads = dependencies.retryFailedUploads ?? false;
  }

  get state(): SyncState {
    return this._state;
  }

  /**
   * Runs one synchronization pass. A synchronizer runs once.
   *
   * @throws SyncAbortedError when the tree cannot be listed
   * @throws PersistFailedError when the fingerprints cannot be written
   */
  async run(): Promise<SyncOutcome> {
    if (this._state !== 'idle') {
      throw new Error(`Synchronizer already ran (state: ${this._state})`);
    }
    this._state = 'walking';

    let files: string[];
    try {
      files = await this.tree.list();
    } catch (err: unknown) {
      this._state = 'aborted';
      this.logger.error(`Cannot list working tree ${this.tree.root}: ${messageOf(err)}`);
      throw new SyncAbortedError(`Sync aborted: ${messageOf(err)}`, err);
    }

    const outcome: SyncOutcome = { uploaded: 0, skipped: 0, failed: 0, files: [] };
    for (const relativePath of files) {
      await this.syncFile(relativePath, outcome);
    }

    this._state = 'persisting';
    try {
      await this.store.persist();
    } catch (err: unknown) {
      this._state = 'aborted';
      this.logger.error(`Cannot persist fingerprints: ${messageOf(err)}`);
      this.logger.info(formatSummary(outcome));
      throw new PersistFailedError(`Fingerprint store not updated: ${messageOf(err)}`, outcome, err);
    }

    this._state = 'done';
    this.logger.info(formatSummary(outcome));
    return outcome;
  }

  /**
   * Classifies every file against the stored fingerprints without uploading
   * or touching the store.
   *
   * @throws SyncAbortedError when the tree cannot be listed
   */
  async plan(): Promise<SyncPlan> {
    let files: string[];
    try {
      files = await this.tree.list();
    } catch (err: unknown) {
      throw new SyncAbortedError(`Sync aborted: ${messageOf(err)}`, err);
    }

    const plan: SyncPlan = { entries: [], new: 0, changed: 0, unchanged: 0, unreadable: 0 };
    for (const relativePath of files) {
      let entry: PlanEntry;
      try {
        const fingerprint = computeFingerprint(await this.tree.read(relativePath));
        const change = classifyChange(this.store.getPrevious(relativePath), fingerprint);
        entry = { path: relativePath, change, fingerprint };
        plan[change]++;
      } catch (err: unknown) {
        entry = { path: relativePath, error: messageOf(err) };
        plan.unreadable++;
      }
      plan.entries.push(entry);
    }
    return plan;
  }

  private async syncFile(relativePath: string, outcome: SyncOutcome): Promise<void> {
    let data: Buffer;
    try {
      data = await this.tree.read(relativePath);
    } catch (err: unknown) {
      outcome.failed++;
      outcome.files.push({ path: relativePath, action: 'failed', error: messageOf(err) });
      this.logger.error(`Failed: ${relativePath} (${messageOf(err)})`);
      return;
    }

    const change = this.store.recordChange(relativePath, computeFingerprint(data));
    if (change === 'unchanged') {
      outcome.skipped++;
      outcome.files.push({ path: relativePath, action: 'skipped', change });
      this.logger.info(`Skipped (unchanged): ${relativePath}`);
      return;
    }

    this.logger.info(`Uploading: ${relativePath}`);
    let result: UploadResult;
    try {
      result = await this.writer.upload(this.tree.resolve(relativePath), relativePath);
    } catch (err: unknown) {
      result = { success: false, code: 'NETWORK_ERROR', error: messageOf(err) };
    }
    if (result.success) {
      outcome.uploaded++;
      outcome.files.push({ path: relativePath, action: 'uploaded', change });
      this.logger.info(`Uploaded: ${relativePath}`);
      return;
    }

    outcome.failed++;
    outcome.files.push({ path: relativePath, action: 'failed', change, error: result.error, code: result.code });
    this.logger.error(`Failed: ${relativePath} (${result.error})`);
    if (this.retryFailedUploads) {
      this.store.revert(relativePath);
    }
  }
}
