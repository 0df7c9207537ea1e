import { Command } from 'commander';
import { CheckCommand } from './check-command';

/**
 * Registers the check command
 */
export function registerCheckCommands(program: Command): void {
  new CheckCommand().register(program);
}
