/**
 * Base Command Class for the streamhost CLI
 *
 * Provides the shared output and error conventions of every command.
 */

import { Command } from 'commander';
import { ConfigError, isSetupError } from '@streamhost/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(isSetupError(error) ? { code: error.code, status: error.status, operation: error.operation } : {}),
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error instanceof Error) {
        if (isSetupError(error) && error.responseBody !== undefined) {
          console.error(`🔍 Response body: ${JSON.stringify(error.responseBody)}`);
        }
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !options.quiet) {
      console.log(`✅ ${message}`);
    }
  }

  /**
   * Parses a non-negative integer flag
   * @throws ConfigError naming the flag
   */
  protected parseMilliseconds(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigError(`${flag} must be a non-negative integer of milliseconds, got "${value}"`, flag);
    }
    return parsed;
  }
}
