export { FsFingerprintStorage, nodeStoreFileSystem } from './fs_fingerprint_storage';
export type { FsFingerprintStorageOptions, StoreFileSystem } from './fs_fingerprint_storage';
