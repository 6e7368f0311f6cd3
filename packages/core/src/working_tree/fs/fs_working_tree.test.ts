/**
 * FsWorkingTree Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsWorkingTree } from './fs_working_tree';
import { WorkingTreeError } from '../working_tree';

describe('FsWorkingTree', () => {
  let tempDir: string;

  const write = async (relativePath: string, content: string = '') => {
    const full = path.join(tempDir, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-working-tree-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('list()', () => {
    it('should list regular files sorted with forward slashes', async () => {
      await write('z.txt');
      await write('src/b.ts');
      await write('a.txt');
      await write('.env.example');

      const tree = new FsWorkingTree({ root: tempDir });

      expect(await tree.list()).toEqual(['.env.example', 'a.txt', 'src/b.ts', 'z.txt']);
    });

    it('should exclude .git directories and .git files at any depth', async () => {
      await write('.git/HEAD', 'ref: refs/heads/main');
      await write('.git/objects/ab/cdef');
      await write('vendor/lib/.git', 'gitdir: ../../.git/modules/lib');
      await write('vendor/lib/index.js');
      await write('.gitignore');

      const tree = new FsWorkingTree({ root: tempDir });

      expect(await tree.list()).toEqual(['.gitignore', 'vendor/lib/index.js']);
    });

    it('should list symbolic links to files but not directories', async () => {
      await write('real.sql', 'select 1');
      await fs.mkdir(path.join(tempDir, 'empty-dir'));
      await fs.symlink(path.join(tempDir, 'real.sql'), path.join(tempDir, 'alias.sql'));

      const tree = new FsWorkingTree({ root: tempDir });

      expect(await tree.list()).toEqual(['alias.sql', 'real.sql']);
      expect((await tree.read('alias.sql')).toString('utf-8')).toBe('select 1');
    });

    it('should not descend into symlinked directories', async () => {
      await write('shared/a.txt');
      await fs.symlink(path.join(tempDir, 'shared'), path.join(tempDir, 'mirror'));

      const tree = new FsWorkingTree({ root: tempDir });

      expect(await tree.list()).toEqual(['shared/a.txt']);
    });

    it('should skip dangling symbolic links', async () => {
      await write('kept.txt');
      await fs.symlink(path.join(tempDir, 'nowhere.txt'), path.join(tempDir, 'dangling.txt'));

      const tree = new FsWorkingTree({ root: tempDir });

      expect(await tree.list()).toEqual(['kept.txt']);
    });

    it('should apply extra exclude patterns', async () => {
      await write('keep.txt');
      await write('logs/pipeline_20240101_000000.log');
      await write('logs/.checksums');

      const tree = new FsWorkingTree({ root: tempDir, exclude: ['logs/**'] });

      expect(await tree.list()).toEqual(['keep.txt']);
    });

    it('should return an empty list for an empty root', async () => {
      const tree = new FsWorkingTree({ root: tempDir });
      expect(await tree.list()).toEqual([]);
    });

    it('should fail with ROOT_NOT_FOUND for a missing root', async () => {
      const tree = new FsWorkingTree({ root: path.join(tempDir, 'missing') });

      await expect(tree.list()).rejects.toBeInstanceOf(WorkingTreeError);
      await expect(tree.list()).rejects.toMatchObject({ code: 'ROOT_NOT_FOUND' });
    });

    it('should fail with NOT_A_DIRECTORY when the root is a file', async () => {
      await write('file.txt');
      const tree = new FsWorkingTree({ root: path.join(tempDir, 'file.txt') });

      await expect(tree.list()).rejects.toMatchObject({ code: 'NOT_A_DIRECTORY' });
    });
  });

  describe('read()', () => {
    it('should return the full bytes of a file', async () => {
      await write('dir/b.txt', 'hi');
      const tree = new FsWorkingTree({ root: tempDir });

      expect((await tree.read('dir/b.txt')).toString('utf-8')).toBe('hi');
    });

    it('should resolve relative paths under the root', () => {
      const tree = new FsWorkingTree({ root: tempDir });
      expect(tree.resolve('dir/b.txt')).toBe(path.join(path.resolve(tempDir), 'dir', 'b.txt'));
    });

    it('should throw READ_ERROR for a file that vanished', async () => {
      const tree = new FsWorkingTree({ root: tempDir });

      await expect(tree.read('gone.txt')).rejects.toMatchObject({ code: 'READ_ERROR', filePath: 'gone.txt' });
    });
  });
});
