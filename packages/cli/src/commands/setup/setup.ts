import { Command } from 'commander';
import { SetupCommand } from './setup-command';

/**
 * Registers the setup command
 */
export function registerSetupCommands(program: Command): void {
  new SetupCommand().register(program);
}
