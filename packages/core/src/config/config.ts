/**
 * Sync configuration from environment variables.
 *
 * Values are read from the environment (the CLI loads `.env` first),
 * defaulted, coerced and then validated against sync_config.schema.json.
 *
 * @module config
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as path from 'path';
import schema from './sync_config.schema.json';
import type { LogLevel } from '../logger';

export type SyncConfig = {
  /** Refresh the working tree from git before syncing */
  refresh: boolean;
  /** GITHUB_REPO; required when refresh is on */
  repoUrl?: string;
  /** GITHUB_PAT; required when refresh is on */
  gitToken?: string;
  branch: string;
  localFolder: string;
  /** DATABRICKS_HOST without trailing slash */
  host: string;
  /** DATABRICKS_TOKEN */
  token: string;
  volumePath: string;
  filesApiPath: string;
  uploadTimeoutMs: number;
  /** Upper bound for each git command of the refresh */
  gitTimeoutMs: number;
  logDir: string;
  checksumFile: string;
  logLevel: LogLevel;
  excludePatterns: string[];
  retryFailedUploads: boolean;
};

export type LoadSyncConfigOptions = {
  /** Default: true */
  refresh?: boolean;
};

export type Env = Record<string, string | undefined>;

export const CONFIG_DEFAULTS = {
  branch: 'main',
  localFolder: './repo',
  volumePath: '/Volumes/catalog/schema/volume',
  filesApiPath: '/api/2.0/fs/files',
  logDir: './logs',
  checksumFileName: '.checksums',
  logLevel: 'info',
  uploadTimeoutMs: 60_000,
  gitTimeoutMs: 300_000,
} as const;

/**
 * Missing or malformed configuration. Raised before any work starts.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = [],
    public readonly errors: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

let validator: ValidateFunction<SyncConfig> | null = null;

function getValidator(): ValidateFunction<SyncConfig> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    validator = ajv.compile<SyncConfig>(schema);
  }
  return validator;
}

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function coerceInteger(raw: string | undefined, fallback: number): number | string {
  if (raw === undefined) return fallback;
  return /^\d+$/.test(raw) ? Number(raw) : raw;
}

function coerceBoolean(raw: string | undefined, fallback: boolean): boolean | string {
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return raw;
}

function splitPatterns(raw: string | undefined): string[] {
  if (raw === undefined) return [];
  return raw.split(',').map(p => p.trim()).filter(p => p.length > 0);
}

/**
 * Builds a validated SyncConfig from environment variables.
 *
 * @throws ConfigurationError naming every missing variable, or carrying the
 *   schema errors for malformed values
 */
export function loadSyncConfig(env: Env = process.env, options: LoadSyncConfigOptions = {}): SyncConfig {
  const refresh = options.refresh ?? true;

  const required = ['DATABRICKS_HOST', 'DATABRICKS_TOKEN'];
  if (refresh) required.unshift('GITHUB_REPO', 'GITHUB_PAT');
  const missing = required.filter(name => read(env, name) === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }

  const logDir = read(env, 'LOG_DIR') ?? CONFIG_DEFAULTS.logDir;
  const candidate: Record<string, unknown> = {
    refresh,
    branch: read(env, 'BRANCH_NAME') ?? CONFIG_DEFAULTS.branch,
    localFolder: read(env, 'LOCAL_FOLDER') ?? CONFIG_DEFAULTS.localFolder,
    host: stripTrailingSlashes(read(env, 'DATABRICKS_HOST') ?? ''),
    token: read(env, 'DATABRICKS_TOKEN'),
    volumePath: stripTrailingSlashes(read(env, 'VOLUME_PATH') ?? CONFIG_DEFAULTS.volumePath),
    filesApiPath: stripTrailingSlashes(read(env, 'FILES_API_PATH') ?? CONFIG_DEFAULTS.filesApiPath),
    uploadTimeoutMs: coerceInteger(read(env, 'UPLOAD_TIMEOUT_MS'), CONFIG_DEFAULTS.uploadTimeoutMs),
    gitTimeoutMs: coerceInteger(read(env, 'GIT_TIMEOUT_MS'), CONFIG_DEFAULTS.gitTimeoutMs),
    logDir,
    checksumFile: read(env, 'CHECKSUM_FILE') ?? path.join(logDir, CONFIG_DEFAULTS.checksumFileName),
    logLevel: read(env, 'LOG_LEVEL')?.toLowerCase() ?? CONFIG_DEFAULTS.logLevel,
    excludePatterns: splitPatterns(read(env, 'EXCLUDE_PATTERNS')),
    retryFailedUploads: coerceBoolean(read(env, 'RETRY_FAILED_UPLOADS'), false),
  };

  const repoUrl = read(env, 'GITHUB_REPO');
  const gitToken = read(env, 'GITHUB_PAT');
  if (repoUrl !== undefined) candidate['repoUrl'] = repoUrl;
  if (gitToken !== undefined) candidate['gitToken'] = gitToken;

  const validate = getValidator();
  if (!validate(candidate)) {
    const errors = (validate.errors ?? []).map(error =>
      `${error.instancePath || 'config'} ${error.message ?? 'is invalid'}`
    );
    throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, [], errors);
  }

  return candidate;
}
