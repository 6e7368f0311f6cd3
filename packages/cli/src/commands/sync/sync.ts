import { Command } from 'commander';
import { SyncCommand } from './sync-command';

/**
 * Registers the sync command
 */
export function registerSyncCommands(program: Command): void {
  new SyncCommand().register(program);
}
