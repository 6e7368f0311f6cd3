import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Config, Synchronizer } from '@volume-mirror/core';
import type { Pipeline } from '@volume-mirror/core';

/**
 * SyncCommand Options
 */
export interface SyncCommandOptions extends BaseCommandOptions {
  /** false with --no-refresh */
  refresh?: boolean;
  retryFailed?: boolean;
}

const STAGE_LABELS: Record<Pipeline.PipelineStage, string> = {
  refresh: 'Git refresh',
  lock: 'Run lock',
  load: 'Loading fingerprints',
  sync: 'Sync',
  persist: 'Saving fingerprints',
};

/**
 * SyncCommand - mirrors the working tree to the remote volume
 *
 * Presentation only: configuration comes from the environment, the work is
 * done by the core pipeline.
 */
export class SyncCommand extends BaseCommand<SyncCommandOptions> {

  register(program: Command): void {
    program
      .command('sync')
      .description('Refresh the working tree and upload new or changed files to the volume')
      .option('--no-refresh', 'Use the working tree as it is, without git fetch/clone')
      .option('--retry-failed', 'Do not record fingerprints of failed uploads, so the next run retries them')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Enable verbose output with detailed information')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (options: SyncCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: SyncCommandOptions): Promise<void> {
    let config: Config.SyncConfig;
    try {
      config = this.dependencyService.getSyncConfig({
        refresh: options.refresh !== false,
        retryFailedUploads: options.retryFailed || false,
      });
    } catch (error) {
      if (error instanceof Config.ConfigurationError) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    }

    const logger = this.dependencyService.createRunLogger(config, {
      verbose: options.verbose || false,
      console: !options.json && !options.quiet,
    });
    const result = await this.dependencyService.runSync(config, logger);

    if (result.stage && result.error) {
      this.handleError(
        `${STAGE_LABELS[result.stage]} failed: ${result.error.message}`,
        options,
        result.error,
        result.exitCode,
        this.toReport(result, logger.logFile)
      );
      return;
    }

    if (!result.outcome) {
      this.handleError('Sync finished without a result', options);
      return;
    }

    const report = this.toReport(result, logger.logFile);
    if (result.exitCode !== 0) {
      if (!options.json) {
        for (const file of result.outcome.files.filter(f => f.action === 'failed')) {
          console.error(`  ✗ ${file.path}: ${file.error ?? 'unknown error'}`);
        }
      }
      this.handleError(
        `${result.outcome.failed} file(s) failed. ${Synchronizer.formatSummary(result.outcome)}`,
        options,
        undefined,
        result.exitCode,
        report
      );
      return;
    }

    this.handleSuccess(report, options, Synchronizer.formatSummary(result.outcome));
    if (options.verbose && !options.json) {
      console.log(`📄 Log: ${logger.logFile}`);
    }
  }

  private toReport(result: Pipeline.PipelineResult, logFile: string) {
    return {
      exitCode: result.exitCode,
      logFile,
      ...(result.stage ? { stage: result.stage } : {}),
      ...(result.refresh ? { refresh: result.refresh } : {}),
      ...(result.outcome
        ? {
          uploaded: result.outcome.uploaded,
          skipped: result.outcome.skipped,
          failed: result.outcome.failed,
          files: result.outcome.files,
        }
        : {}),
    };
  }
}
