/**
 * FingerprintStore - Change-detection baseline across runs
 *
 * Holds two mappings:
 * - `previous`: loaded once from storage, never mutated
 * - `pending`: filled during the current walk, written back replacing the
 *   stored state entirely
 *
 * Paths absent from the walk are absent from `pending`, so a persisted store
 * only ever covers the files seen by the last successful run.
 *
 * @module fingerprint_store
 */

import { classifyChange, isChanged } from '../change_detector';
import type { ChangeKind } from '../change_detector';
import type { FingerprintMap } from './fingerprint_store.codec';
import { FingerprintStoreError } from './fingerprint_store.errors';

/**
 * Backend holding the persisted mapping.
 *
 * Implementations:
 * - FsFingerprintStorage: `path=fingerprint` text file, atomic replace
 * - MemoryFingerprintStorage: in-memory, for tests
 */
export interface FingerprintStorage {
  /**
   * Loads the persisted mapping. A store that was never written yields an
   * empty map.
   */
  load(): Promise<FingerprintMap>;

  /**
   * Replaces the persisted mapping with `fingerprints`. Either the whole new
   * mapping is stored or the old one is left intact.
   */
  save(fingerprints: FingerprintMap): Promise<void>;
}

export class FingerprintStore {
  private readonly previous: ReadonlyMap<string, string>;
  private readonly pending: FingerprintMap = new Map();
  private persisted = false;

  constructor(
    private readonly storage: FingerprintStorage,
    previous: FingerprintMap
  ) {
    this.previous = new Map(previous);
  }

  /**
   * Loads the previous run's fingerprints and returns a store ready for a
   * new walk.
   */
  static async open(storage: FingerprintStorage): Promise<FingerprintStore> {
    const previous = await storage.load();
    return new FingerprintStore(storage, previous);
  }

  /**
   * Records `fingerprint` for `filePath` in `pending`, overwriting any
   * earlier pending value, and reports whether it differs from `previous`.
   */
  record(filePath: string, fingerprint: string): boolean {
    return isChanged(this.recordChange(filePath, fingerprint));
  }

  /**
   * Same as record(), returning the classified change.
   */
  recordChange(filePath: string, fingerprint: string): ChangeKind {
    this.pending.set(filePath, fingerprint);
    return classifyChange(this.previous.get(filePath), fingerprint);
  }

  /**
   * Puts `filePath` back to its previous state in `pending`: the stored
   * fingerprint if there was one, otherwise no entry.
   */
  revert(filePath: string): void {
    const previous = this.previous.get(filePath);
    if (previous === undefined) {
      this.pending.delete(filePath);
    } else {
      this.pending.set(filePath, previous);
    }
  }

  getPrevious(filePath: string): string | undefined {
    return this.previous.get(filePath);
  }

  getPending(filePath: string): string | undefined {
    return this.pending.get(filePath);
  }

  get previousSize(): number {
    return this.previous.size;
  }

  /**
   * Writes `pending` through the storage. Allowed once per store.
   */
  async persist(): Promise<void> {
    if (this.persisted) {
      throw new FingerprintStoreError('Fingerprint store already persisted for this run', 'ALREADY_PERSISTED');
    }
    this.persisted = true;
    await this.storage.save(new Map(this.pending));
  }
}
