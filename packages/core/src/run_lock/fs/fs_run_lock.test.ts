import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FsRunLock, isProcessAlive, UNPARSABLE_LOCK_GRACE_MS } from './fs_run_lock';
import { RunLockError } from '../run_lock';

describe('FsRunLock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-run-lock-test-'));
    lockPath = path.join(tempDir, '.checksums.lock');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeHolder = (pid: number, hostname: string = os.hostname()) =>
    fs.writeFile(lockPath, JSON.stringify({ pid, hostname, acquiredAt: '2024-01-01T00:00:00.000Z' }), 'utf-8');

  it('should derive the lock path from the store path', () => {
    expect(FsRunLock.forStore('/data/.checksums').lockPath).toBe('/data/.checksums.lock');
  });

  it('should create the lock file with the current pid and remove it on release', async () => {
    const lock = new FsRunLock({ lockPath });

    await lock.acquire();
    const info = JSON.parse(await fs.readFile(lockPath, 'utf-8'));
    expect(info.pid).toBe(process.pid);
    expect(info.hostname).toBe(os.hostname());

    await lock.release();
    await expect(fs.access(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should create missing parent directories', async () => {
    const nested = new FsRunLock({ lockPath: path.join(tempDir, 'logs', 'x.lock') });
    await nested.acquire();
    await expect(fs.access(path.join(tempDir, 'logs', 'x.lock'))).resolves.toBeUndefined();
  });

  it('should refuse a lock held by a live process', async () => {
    await writeHolder(4242);
    const lock = new FsRunLock({ lockPath, isProcessAlive: () => true });

    await expect(lock.acquire()).rejects.toBeInstanceOf(RunLockError);
    await expect(lock.acquire()).rejects.toMatchObject({ holder: { pid: 4242 } });
  });

  it('should take over a lock left by a dead process', async () => {
    await writeHolder(4242);
    const isAlive = jest.fn().mockReturnValue(false);
    const lock = new FsRunLock({ lockPath, isProcessAlive: isAlive });

    await lock.acquire();

    expect(isAlive).toHaveBeenCalledWith(4242);
    expect(JSON.parse(await fs.readFile(lockPath, 'utf-8')).pid).toBe(process.pid);
  });

  it('should take over an unparsable lock file once it is old', async () => {
    await fs.writeFile(lockPath, 'not json', 'utf-8');
    const past = new Date(Date.now() - UNPARSABLE_LOCK_GRACE_MS - 60_000);
    await fs.utimes(lockPath, past, past);
    const lock = new FsRunLock({ lockPath, isProcessAlive: () => true });

    await lock.acquire();

    expect(JSON.parse(await fs.readFile(lockPath, 'utf-8')).pid).toBe(process.pid);
  });

  it('should refuse a recent unparsable lock file', async () => {
    await fs.writeFile(lockPath, '', 'utf-8');
    const lock = new FsRunLock({ lockPath, isProcessAlive: () => true });

    await expect(lock.acquire()).rejects.toBeInstanceOf(RunLockError);
    expect(await fs.readFile(lockPath, 'utf-8')).toBe('');
  });

  it('should let exactly one of two concurrent runs take over a stale lock', async () => {
    const isAlive = (pid: number) => pid !== 999999;

    for (let round = 0; round < 25; round++) {
      await writeHolder(999999);
      const a = new FsRunLock({ lockPath, isProcessAlive: isAlive });
      const b = new FsRunLock({ lockPath, isProcessAlive: isAlive });

      const results = await Promise.allSettled([a.acquire(), b.acquire()]);

      expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter(result => result.status === 'rejected')).toHaveLength(1);
      expect(JSON.parse(await fs.readFile(lockPath, 'utf-8')).pid).toBe(process.pid);

      await a.release();
      await b.release();
      await expect(fs.access(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
    }

    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should leave a lock taken over by another run in place on release', async () => {
    const lock = new FsRunLock({ lockPath });
    await lock.acquire();
    await fs.writeFile(lockPath, JSON.stringify({ pid: 4242, hostname: os.hostname(), acquiredAt: 'x' }), 'utf-8');

    await lock.release();

    expect(JSON.parse(await fs.readFile(lockPath, 'utf-8')).pid).toBe(4242);
  });

  it('should not take over a lock from another host', async () => {
    await writeHolder(4242, 'some-other-host.invalid');
    const lock = new FsRunLock({ lockPath, isProcessAlive: () => false });

    await expect(lock.acquire()).rejects.toBeInstanceOf(RunLockError);
  });

  it('should not remove a lock it does not hold', async () => {
    await writeHolder(4242);
    const lock = new FsRunLock({ lockPath });

    await lock.release();

    await expect(fs.access(lockPath)).resolves.toBeUndefined();
  });
});

describe('isProcessAlive', () => {
  it('should report the current process as alive', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
