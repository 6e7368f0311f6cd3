#!/usr/bin/env node

import { Command } from 'commander';
import { registerSyncCommands } from './commands/sync/sync';
import { registerStatusCommands } from './commands/status/status';

const program = new Command();

program
  .name('volume-mirror')
  .description('Mirror a git working tree into a remote volume, uploading only changed files')
  .version('1.0.0');

registerSyncCommands(program);
registerStatusCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
