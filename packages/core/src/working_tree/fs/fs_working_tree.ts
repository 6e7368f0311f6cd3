/**
 * FsWorkingTree - Filesystem-based WorkingTree
 *
 * Lists with fast-glob and filters the result again with picomatch so a
 * `.git` component at any depth (directory or submodule `.git` file) never
 * reaches the caller. A symbolic link is listed when its target is a
 * regular file; symlinked directories are not descended into.
 *
 * @module working_tree/fs/fs_working_tree
 */

import fg from 'fast-glob';
import picomatch from 'picomatch';
import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import type { WorkingTree, FsWorkingTreeOptions } from '../working_tree';
import { WorkingTreeError } from '../working_tree';

const GIT_METADATA_PATTERNS = ['**/.git', '**/.git/**'];

export class FsWorkingTree implements WorkingTree {
  readonly root: string;
  private readonly ignore: string[];
  private readonly isExcluded: picomatch.Matcher;

  constructor(options: FsWorkingTreeOptions) {
    this.root = path.resolve(options.root);
    this.ignore = [...GIT_METADATA_PATTERNS, ...(options.exclude ?? [])];
    this.isExcluded = picomatch(this.ignore, { dot: true });
  }

  async list(): Promise<string[]> {
    await this.assertRoot();

    const entries = await fg('**/*', {
      cwd: this.root,
      dot: true,
      onlyFiles: false,
      objectMode: true,
      followSymbolicLinks: false,
      ignore: this.ignore,
    });

    const files: string[] = [];
    for (const entry of entries) {
      if (entry.path.split('/').includes('.git') || this.isExcluded(entry.path)) continue;
      if (entry.dirent.isFile() || (entry.dirent.isSymbolicLink() && (await this.isFileTarget(entry.path)))) {
        files.push(entry.path);
      }
    }
    return files.sort();
  }

  resolve(relativePath: string): string {
    return path.join(this.root, ...relativePath.split('/'));
  }

  async read(relativePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(relativePath));
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      throw new WorkingTreeError(
        `Cannot read ${relativePath}: ${error.message}`,
        'READ_ERROR',
        relativePath
      );
    }
  }

  private async isFileTarget(relativePath: string): Promise<boolean> {
    try {
      return (await fs.stat(this.resolve(relativePath))).isFile();
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      // Dangling or looping link
      if (error.code === 'ENOENT' || error.code === 'ELOOP') return false;
      throw new WorkingTreeError(
        `Cannot inspect link ${relativePath}: ${error.message}`,
        'READ_ERROR',
        relativePath
      );
    }
  }

  private async assertRoot(): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(this.root);
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      throw new WorkingTreeError(
        `Working tree root not found: ${this.root} (${error.code ?? error.message})`,
        'ROOT_NOT_FOUND',
        this.root
      );
    }
    if (!stats.isDirectory()) {
      throw new WorkingTreeError(
        `Working tree root is not a directory: ${this.root}`,
        'NOT_A_DIRECTORY',
        this.root
      );
    }
  }
}
