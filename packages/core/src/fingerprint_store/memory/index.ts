export { MemoryFingerprintStorage } from './memory_fingerprint_storage';
export type { MemoryFingerprintStorageOptions } from './memory_fingerprint_storage';
