/**
 * Sync pipeline - everything one invocation does
 *
 * refresh (optional) → lock → load store → walk/upload → persist → unlock.
 * Never throws; failures come back as a PipelineResult with exit code 1 and
 * the stage that failed.
 *
 * @module pipeline/sync_pipeline
 */

import * as path from 'path';
import type { SyncConfig } from '../config';
import { ConfigurationError } from '../config';
import { FingerprintStore, FsFingerprintStorage } from '../fingerprint_store';
import type { FingerprintStorage } from '../fingerprint_store';
import { GitRefresher, createExecCommand } from '../git';
import type { RefreshOptions, RefreshResult } from '../git';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { HttpRemoteWriter } from '../remote_writer';
import type { RemoteWriter } from '../remote_writer';
import { FsRunLock } from '../run_lock';
import type { RunLock } from '../run_lock';
import { Synchronizer, exitCodeFor, PersistFailedError } from '../synchronizer';
import type { SyncOutcome, SyncPlan } from '../synchronizer';
import { FsWorkingTree } from '../working_tree';

export type PipelineStage = 'refresh' | 'lock' | 'load' | 'sync' | 'persist';

export type PipelineResult = {
  exitCode: number;
  outcome?: SyncOutcome;
  refresh?: RefreshResult;
  /** Stage that stopped the run */
  stage?: PipelineStage;
  error?: Error;
};

export type SyncPipelineDependencies = {
  logger?: Logger;
  refresher?: { refresh(options: RefreshOptions): Promise<RefreshResult> };
  writer?: RemoteWriter;
  storage?: FingerprintStorage;
  lock?: RunLock;
  /** Run log file, reported at start */
  logFile?: string;
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Paths the pipeline itself writes that live inside the working tree and
 * must not be mirrored.
 */
export function selfExcludes(config: SyncConfig): string[] {
  const root = path.resolve(config.localFolder);
  const inside = (target: string): string | null => {
    const rel = path.relative(root, path.resolve(target));
    if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return null;
    return rel.split(path.sep).join('/');
  };

  const excludes: string[] = [];
  const logDir = inside(config.logDir);
  if (logDir) excludes.push(`${logDir}/**`);
  const store = inside(config.checksumFile);
  if (store) {
    excludes.push(store, `${store}.lock`, `${store}.lock.*`, path.posix.join(path.posix.dirname(store), `.${path.posix.basename(store)}.*.tmp`));
  }
  return excludes;
}

export function createWorkingTree(config: SyncConfig): FsWorkingTree {
  return new FsWorkingTree({
    root: config.localFolder,
    exclude: [...config.excludePatterns, ...selfExcludes(config)],
  });
}

export function createRemoteWriter(config: SyncConfig, logger?: Logger): HttpRemoteWriter {
  return new HttpRemoteWriter({
    host: config.host,
    token: config.token,
    volumePath: config.volumePath,
    filesApiPath: config.filesApiPath,
    timeoutMs: config.uploadTimeoutMs,
    ...(logger ? { logger } : {}),
  });
}

/**
 * Runs one full synchronization for `config`.
 */
export async function runSyncPipeline(
  config: SyncConfig,
  deps: SyncPipelineDependencies = {}
): Promise<PipelineResult> {
  const logger = deps.logger ?? createLogger('[Pipeline] ');
  logger.info(`Starting pipeline: ${config.localFolder} → ${config.host}${config.volumePath}`);
  if (deps.logFile) logger.info(`Log file: ${deps.logFile}`);

  let refresh: RefreshResult | undefined;
  if (config.refresh) {
    try {
      if (!config.repoUrl || !config.gitToken) {
        throw new ConfigurationError('GITHUB_REPO and GITHUB_PAT are required to refresh the working tree');
      }
      const refresher = deps.refresher ?? new GitRefresher({ execCommand: createExecCommand() });
      refresh = await refresher.refresh({
        repoUrl: config.repoUrl,
        token: config.gitToken,
        branch: config.branch,
        localFolder: config.localFolder,
        timeoutMs: config.gitTimeoutMs,
      });
      logger.info(`Working tree ${refresh.action} at ${refresh.head}`);
    } catch (err: unknown) {
      const error = toError(err);
      logger.error(`Git refresh failed: ${error.message}`);
      return { exitCode: 1, stage: 'refresh', error };
    }
  }

  const lock = deps.lock ?? FsRunLock.forStore(config.checksumFile);
  try {
    await lock.acquire();
  } catch (err: unknown) {
    const error = toError(err);
    logger.error(error.message);
    return { exitCode: 1, stage: 'lock', error, ...(refresh ? { refresh } : {}) };
  }

  try {
    let store: FingerprintStore;
    try {
      store = await FingerprintStore.open(deps.storage ?? new FsFingerprintStorage({ filePath: config.checksumFile }));
    } catch (err: unknown) {
      const error = toError(err);
      logger.error(error.message);
      return { exitCode: 1, stage: 'load', error, ...(refresh ? { refresh } : {}) };
    }
    logger.debug(`Loaded ${store.previousSize} fingerprints from ${config.checksumFile}`);

    const synchronizer = new Synchronizer({
      tree: createWorkingTree(config),
      store,
      writer: deps.writer ?? createRemoteWriter(config, logger),
      logger,
      retryFailedUploads: config.retryFailedUploads,
    });

    try {
      const outcome = await synchronizer.run();
      const exitCode = exitCodeFor(outcome);
      logger.info(`Files available at: ${config.volumePath}`);
      logger.info(`Pipeline finished with exit code ${exitCode}`);
      return { exitCode, outcome, ...(refresh ? { refresh } : {}) };
    } catch (err: unknown) {
      const error = toError(err);
      if (err instanceof PersistFailedError) {
        return { exitCode: 1, stage: 'persist', error, outcome: err.outcome, ...(refresh ? { refresh } : {}) };
      }
      return { exitCode: 1, stage: 'sync', error, ...(refresh ? { refresh } : {}) };
    }
  } finally {
    try {
      await lock.release();
    } catch (err: unknown) {
      logger.warn(`Cannot release run lock: ${toError(err).message}`);
    }
  }
}

/**
 * Dry run: classifies the current working tree against the persisted
 * fingerprints. No refresh, no lock, no uploads, no writes.
 */
export async function planSync(
  config: SyncConfig,
  deps: Pick<SyncPipelineDependencies, 'storage' | 'logger'> = {}
): Promise<SyncPlan> {
  const store = await FingerprintStore.open(deps.storage ?? new FsFingerprintStorage({ filePath: config.checksumFile }));
  const synchronizer = new Synchronizer({
    tree: createWorkingTree(config),
    store,
    writer: { upload: async () => ({ success: false, code: 'NETWORK_ERROR', error: 'Uploads are disabled in a dry run' }) },
    ...(deps.logger ? { logger: deps.logger } : {}),
  });
  return synchronizer.plan();
}
