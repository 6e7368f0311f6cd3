export { loadSyncConfig, ConfigurationError, CONFIG_DEFAULTS } from './config';
export type { SyncConfig, LoadSyncConfigOptions, Env } from './config';
