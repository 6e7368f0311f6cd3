/**
 * SyncCommand Unit Tests
 *
 * The DependencyInjectionService is mocked; core types and errors are real.
 */

const mockRunLogger = {
  logFile: '/var/log/mirror/pipeline_20240102_030405.log',
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

const mockDependencyService = {
  getSyncConfig: jest.fn(),
  createRunLogger: jest.fn(),
  runSync: jest.fn(),
  planSync: jest.fn(),
};

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn().mockReturnValue(mockDependencyService)
  }
}));

import { Command } from 'commander';
import { SyncCommand } from './sync-command';
import { Config } from '@volume-mirror/core';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const config = {
  refresh: true,
  repoUrl: 'github.com/acme/site.git',
  gitToken: 'test-secret',
  branch: 'main',
  localFolder: './repo',
  host: 'https://workspace.example.com',
  token: 'test-secret',
  volumePath: '/Volumes/main/raw/landing',
  filesApiPath: '/api/2.0/fs/files',
  uploadTimeoutMs: 60000,
  gitTimeoutMs: 300000,
  logDir: '/var/log/mirror',
  checksumFile: '/var/log/mirror/.checksums',
  logLevel: 'info',
  excludePatterns: [],
  retryFailedUploads: false,
};

describe('SyncCommand', () => {
  let syncCommand: SyncCommand;

  beforeEach(() => {
    jest.clearAllMocks();
    syncCommand = new SyncCommand();
    mockDependencyService.getSyncConfig.mockReturnValue(config);
    mockDependencyService.createRunLogger.mockReturnValue(mockRunLogger);
  });

  describe('successful run', () => {
    beforeEach(() => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 0,
        outcome: {
          uploaded: 1,
          skipped: 1,
          failed: 0,
          files: [
            { path: 'a.txt', action: 'skipped', change: 'unchanged' },
            { path: 'b.txt', action: 'uploaded', change: 'new' },
          ],
        },
      });
    });

    it('should print the summary and not exit', async () => {
      await syncCommand.execute({});

      expect(mockDependencyService.getSyncConfig).toHaveBeenCalledWith({ refresh: true, retryFailedUploads: false });
      expect(mockDependencyService.runSync).toHaveBeenCalledWith(config, mockRunLogger);
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Uploaded: 1 | Skipped: 1 | Failed: 0');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should pass --no-refresh and --retry-failed through', async () => {
      await syncCommand.execute({ refresh: false, retryFailed: true });

      expect(mockDependencyService.getSyncConfig).toHaveBeenCalledWith({ refresh: false, retryFailedUploads: true });
    });

    it('should print the log file path when verbose', async () => {
      await syncCommand.execute({ verbose: true });

      expect(mockDependencyService.createRunLogger).toHaveBeenCalledWith(config, { verbose: true, console: true });
      expect(mockConsoleLog).toHaveBeenCalledWith('📄 Log: /var/log/mirror/pipeline_20240102_030405.log');
    });

    it('should emit a JSON report and keep logs off the console', async () => {
      await syncCommand.execute({ json: true });

      expect(mockDependencyService.createRunLogger).toHaveBeenCalledWith(config, { verbose: false, console: false });
      expect(mockConsoleLog).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toEqual({
        success: true,
        data: {
          exitCode: 0,
          logFile: '/var/log/mirror/pipeline_20240102_030405.log',
          uploaded: 1,
          skipped: 1,
          failed: 0,
          files: [
            { path: 'a.txt', action: 'skipped', change: 'unchanged' },
            { path: 'b.txt', action: 'uploaded', change: 'new' },
          ],
        },
      });
    });

    it('should print nothing when quiet', async () => {
      await syncCommand.execute({ quiet: true });

      expect(mockDependencyService.createRunLogger).toHaveBeenCalledWith(config, { verbose: false, console: false });
      expect(mockConsoleLog).not.toHaveBeenCalled();
    });
  });

  describe('failures', () => {
    it('should exit 1 before any work on a configuration error', async () => {
      mockDependencyService.getSyncConfig.mockImplementation(() => {
        throw new Config.ConfigurationError('Missing required environment variables: DATABRICKS_HOST', ['DATABRICKS_HOST']);
      });

      await syncCommand.execute({});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Missing required environment variables: DATABRICKS_HOST');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockDependencyService.runSync).not.toHaveBeenCalled();
    });

    it('should list failed files and exit 1 when an upload fails', async () => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 1,
        outcome: {
          uploaded: 0,
          skipped: 1,
          failed: 1,
          files: [
            { path: 'a.txt', action: 'skipped', change: 'unchanged' },
            { path: 'b.txt', action: 'failed', change: 'new', error: 'Simulated network error', code: 'NETWORK_ERROR' },
          ],
        },
      });

      await syncCommand.execute({});

      expect(mockConsoleError).toHaveBeenNthCalledWith(1, '  ✗ b.txt: Simulated network error');
      expect(mockConsoleError).toHaveBeenNthCalledWith(2, '❌ 1 file(s) failed. Uploaded: 0 | Skipped: 1 | Failed: 1');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should include the report in JSON failure output', async () => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 1,
        outcome: {
          uploaded: 0,
          skipped: 0,
          failed: 1,
          files: [{ path: 'b.txt', action: 'failed', change: 'new', error: 'HTTP 500 Internal Server Error' }],
        },
      });

      await syncCommand.execute({ json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output.success).toBe(false);
      expect(output.exitCode).toBe(1);
      expect(output.data.failed).toBe(1);
      expect(output.data.files[0].path).toBe('b.txt');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should name the stage that stopped the pipeline', async () => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 1,
        stage: 'refresh',
        error: new Error('git clone failed with exit code 128'),
      });

      await syncCommand.execute({});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Git refresh failed: git clone failed with exit code 128');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should report a persist failure with its outcome in JSON', async () => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 1,
        stage: 'persist',
        error: new Error('Fingerprint store not updated: disk full'),
        outcome: { uploaded: 2, skipped: 0, failed: 0, files: [] },
      });

      await syncCommand.execute({ json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toMatchObject({
        success: false,
        error: 'Saving fingerprints failed: Fingerprint store not updated: disk full',
        exitCode: 1,
        data: { stage: 'persist', uploaded: 2 },
      });
    });
  });

  describe('register()', () => {
    it('should wire sync options into commander', async () => {
      mockDependencyService.runSync.mockResolvedValue({
        exitCode: 0,
        outcome: { uploaded: 0, skipped: 0, failed: 0, files: [] },
      });
      const program = new Command();
      syncCommand.register(program);

      await program.parseAsync(['node', 'volume-mirror', 'sync', '--no-refresh', '--retry-failed']);

      expect(mockDependencyService.getSyncConfig).toHaveBeenCalledWith({ refresh: false, retryFailedUploads: true });
    });
  });
});
