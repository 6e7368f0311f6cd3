import { Command } from 'commander';
import { StatusCommand } from './status-command';

/**
 * Registers the status command
 */
export function registerStatusCommands(program: Command): void {
  new StatusCommand().register(program);
}
