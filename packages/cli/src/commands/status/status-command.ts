import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Config } from '@volume-mirror/core';
import type { Synchronizer } from '@volume-mirror/core';

export type StatusCommandOptions = BaseCommandOptions;

/**
 * StatusCommand - dry run
 *
 * Shows which files the next sync would upload. Never refreshes, uploads or
 * writes the fingerprint store.
 */
export class StatusCommand extends BaseCommand<StatusCommandOptions> {

  register(program: Command): void {
    program
      .command('status')
      .description('Show which files the next sync would upload, without uploading')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'List unchanged files too')
      .option('--quiet', 'Only print the summary line')
      .action(async (options: StatusCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: StatusCommandOptions): Promise<void> {
    let config: Config.SyncConfig;
    try {
      config = this.dependencyService.getSyncConfig({ refresh: false });
    } catch (error) {
      if (error instanceof Config.ConfigurationError) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    }

    let plan: Synchronizer.SyncPlan;
    try {
      plan = await this.dependencyService.planSync(config);
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
      return;
    }

    if (options.json) {
      this.handleSuccess(plan, options);
      return;
    }

    if (!options.quiet) {
      for (const entry of plan.entries) {
        if (entry.error !== undefined) {
          console.log(`  unreadable  ${entry.path} (${entry.error})`);
        } else if (entry.change !== 'unchanged' || options.verbose) {
          console.log(`  ${(entry.change ?? '').padEnd(10)}  ${entry.path}`);
        }
      }
    }
    console.log(formatPlanSummary(plan));
  }
}

export function formatPlanSummary(plan: Synchronizer.SyncPlan): string {
  return `New: ${plan.new} | Changed: ${plan.changed} | Unchanged: ${plan.unchanged} | Unreadable: ${plan.unreadable}`;
}
