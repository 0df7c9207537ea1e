#!/usr/bin/env node

import { Command } from 'commander';
import { registerSetupCommands } from './commands/setup/setup';
import { registerCheckCommands } from './commands/check/check';

const program = new Command();

program
  .name('streamhost')
  .description('Provision a GitHub repository that runs a 24/7 YouTube stream')
  .version('1.0.0');

registerSetupCommands(program);
registerCheckCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
