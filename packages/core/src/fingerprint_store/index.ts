/**
 * FingerprintStore - persisted path → fingerprint baseline
 *
 * @module fingerprint_store
 */

export { FingerprintStore } from './fingerprint_store';
export type { FingerprintStorage } from './fingerprint_store';
export { parseFingerprints, serializeFingerprints } from './fingerprint_store.codec';
export type { FingerprintMap } from './fingerprint_store.codec';
export { FingerprintStoreError } from './fingerprint_store.errors';
export type { FingerprintStoreErrorCode } from './fingerprint_store.errors';
export { FsFingerprintStorage, nodeStoreFileSystem } from './fs';
export type { FsFingerprintStorageOptions, StoreFileSystem } from './fs';
export { MemoryFingerprintStorage } from './memory';
export type { MemoryFingerprintStorageOptions } from './memory';
