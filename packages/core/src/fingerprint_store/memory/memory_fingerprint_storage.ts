/**
 * MemoryFingerprintStorage - In-memory FingerprintStorage for tests
 *
 * @module fingerprint_store/memory/memory_fingerprint_storage
 */

import type { FingerprintStorage } from '../fingerprint_store';
import type { FingerprintMap } from '../fingerprint_store.codec';
import { FingerprintStoreError } from '../fingerprint_store.errors';

export type MemoryFingerprintStorageOptions = {
  /** Initial persisted mapping */
  fingerprints?: FingerprintMap | Record<string, string>;
};

/**
 * @example
 * ```typescript
 * const storage = new MemoryFingerprintStorage({ fingerprints: { 'a.txt': 'd41d8...' } });
 * const store = await FingerprintStore.open(storage);
 * ```
 */
export class MemoryFingerprintStorage implements FingerprintStorage {
  private fingerprints: FingerprintMap;
  private failSaves = false;
  private saves = 0;

  constructor(options: MemoryFingerprintStorageOptions = {}) {
    const initial = options.fingerprints ?? new Map<string, string>();
    this.fingerprints = initial instanceof Map ? new Map(initial) : new Map(Object.entries(initial));
  }

  async load(): Promise<FingerprintMap> {
    return new Map(this.fingerprints);
  }

  async save(fingerprints: FingerprintMap): Promise<void> {
    if (this.failSaves) {
      throw new FingerprintStoreError('Simulated write failure', 'WRITE_ERROR');
    }
    this.saves++;
    this.fingerprints = new Map(fingerprints);
  }

  // ==================== Test Helper Methods ====================

  /** Makes every following save() fail, leaving the stored mapping intact. */
  setFailSaves(fail: boolean): void {
    this.failSaves = fail;
  }

  /** Snapshot of the persisted mapping as a plain object. */
  getFingerprints(): Record<string, string> {
    return Object.fromEntries(this.fingerprints);
  }

  get saveCount(): number {
    return this.saves;
  }
}
