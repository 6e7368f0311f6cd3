/**
 * MemoryRemoteWriter - In-memory RemoteWriter for tests
 *
 * Reads the local file like a real writer and keeps the bytes per remote
 * path. Paths registered with failOn() fail with a simulated network error.
 *
 * @module remote_writer/memory/memory_remote_writer
 */

import { readFile } from 'fs/promises';
import type { RemoteWriter, UploadResult } from '../remote_writer';

export class MemoryRemoteWriter implements RemoteWriter {
  private readonly files = new Map<string, Buffer>();
  private readonly failing = new Set<string>();
  private readonly calls: string[] = [];

  async upload(localPath: string, remoteRelativePath: string): Promise<UploadResult> {
    this.calls.push(remoteRelativePath);

    if (this.failing.has(remoteRelativePath)) {
      return { success: false, code: 'NETWORK_ERROR', error: 'Simulated network error' };
    }

    try {
      this.files.set(remoteRelativePath, await readFile(localPath));
    } catch (err: unknown) {
      return { success: false, code: 'READ_ERROR', error: err instanceof Error ? err.message : String(err) };
    }
    return { success: true };
  }

  // ==================== Test Helper Methods ====================

  failOn(...remoteRelativePaths: string[]): void {
    for (const p of remoteRelativePaths) this.failing.add(p);
  }

  clearFailures(): void {
    this.failing.clear();
  }

  /** Remote paths passed to upload(), in call order. */
  getCalls(): string[] {
    return [...this.calls];
  }

  getContent(remoteRelativePath: string): string | undefined {
    return this.files.get(remoteRelativePath)?.toString('utf-8');
  }

  resetCalls(): void {
    this.calls.length = 0;
  }
}
