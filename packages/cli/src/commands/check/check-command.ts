import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { CheckCommandOptions } from '../../types/command-options';

export type { CheckCommandOptions };

/**
 * CheckCommand - validates the local workspace without touching the network
 */
export class CheckCommand extends BaseCommand<CheckCommandOptions> {

  register(program: Command): void {
    program
      .command('check')
      .description('Check the workload files and setup file without any network call')
      .option('-d, --dir <path>', 'Workspace directory holding the workload and setup file')
      .option('-c, --config <file>', 'Setup file, relative to the workspace (default: setup_github.txt)')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Enable verbose output with detailed information')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (options: CheckCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: CheckCommandOptions): Promise<void> {
    try {
      const orchestrator = this.dependencyService.getSetupOrchestrator({
        cwd: options.dir,
        configFile: options.config,
        logLevel: options.json || options.quiet ? 'silent' : options.verbose ? 'info' : 'warn',
      });

      const result = await orchestrator.check();

      if (result.error) {
        this.handleError(`Check failed in ${result.state}: ${result.error.message}`, options, result.error);
        return;
      }

      const repoName = result.context.config?.repoName;
      this.handleSuccess(
        { state: result.state, repoName: repoName ?? null },
        options,
        `Workspace ready${repoName ? ` for repository ${repoName}` : ''}`,
      );
    } catch (error: unknown) {
      this.handleError(error instanceof Error ? error.message : String(error), options, error);
    }
  }
}
