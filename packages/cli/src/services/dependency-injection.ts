import * as dotenv from 'dotenv';
import { Config, Git, Logger, Pipeline } from '@volume-mirror/core';
import type { RemoteWriter, Synchronizer } from '@volume-mirror/core';

/**
 * Dependency Injection Service for the volume-mirror CLI
 *
 * Builds the configuration value object once and wires the core modules
 * that need it.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private environmentLoaded = false;
  private execCommand: Git.ExecCommand | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Loads `.env` from the working directory (or `envFile`) into
   * process.env. Variables already set in the environment win.
   */
  loadEnvironment(envFile?: string): void {
    if (this.environmentLoaded) return;
    dotenv.config(envFile ? { path: envFile } : {});
    this.environmentLoaded = true;
  }

  /**
   * @throws Config.ConfigurationError
   */
  getSyncConfig(options: { refresh: boolean; retryFailedUploads?: boolean }): Config.SyncConfig {
    this.loadEnvironment();
    const config = Config.loadSyncConfig(process.env, { refresh: options.refresh });
    return options.retryFailedUploads ? { ...config, retryFailedUploads: true } : config;
  }

  createRunLogger(config: Config.SyncConfig, options: { verbose?: boolean; console?: boolean } = {}): Logger.RunLogger {
    return Logger.createRunLogger({
      logDir: config.logDir,
      level: options.verbose ? 'debug' : config.logLevel,
      console: options.console ?? true,
    });
  }

  getExecCommand(): Git.ExecCommand {
    if (!this.execCommand) {
      this.execCommand = Git.createExecCommand();
    }
    return this.execCommand;
  }

  getGitRefresher(): Git.GitRefresher {
    return new Git.GitRefresher({ execCommand: this.getExecCommand() });
  }

  getRemoteWriter(config: Config.SyncConfig, logger: Logger.Logger): RemoteWriter.RemoteWriter {
    return Pipeline.createRemoteWriter(config, logger);
  }

  async runSync(config: Config.SyncConfig, logger: Logger.RunLogger): Promise<Pipeline.PipelineResult> {
    return Pipeline.runSyncPipeline(config, {
      logger,
      logFile: logger.logFile,
      refresher: this.getGitRefresher(),
      writer: this.getRemoteWriter(config, logger),
    });
  }

  async planSync(config: Config.SyncConfig): Promise<Synchronizer.SyncPlan> {
    return Pipeline.planSync(config);
  }
}
