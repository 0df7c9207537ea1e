import { Command } from 'commander';
import type { LogLevel, RunState, SetupRunResult, SetupState } from '@streamhost/core';
import { BaseCommand } from '../../base/base-command';
import type { SetupCommandOptions } from '../../types/command-options';

export type { SetupCommandOptions };

const STATE_LABELS: Record<SetupState, string> = {
  Init: 'Starting',
  FilesChecked: 'Workload files found',
  ConfigLoaded: 'Setup config loaded',
  TokenVerified: 'Token verified',
  RepoProvisioned: 'Repository ready',
  FilesUploaded: 'Files uploaded',
  SecretsProvisioned: 'Secrets provisioned',
  Done: 'Done',
};

/**
 * SetupCommand - provisions the streaming repository end to end
 *
 * Runs the orchestrator and renders its result. Never prints the token or a
 * secret value: output is built from names, paths and statuses only.
 */
export class SetupCommand extends BaseCommand<SetupCommandOptions> {

  register(program: Command): void {
    program
      .command('setup')
      .description('Create or reuse the repository, upload the workload and provision its secrets')
      .option('-d, --dir <path>', 'Workspace directory holding the workload and setup file')
      .option('-c, --config <file>', 'Setup file, relative to the workspace (default: setup_github.txt)')
      .option('--api-url <url>', 'GitHub API base URL (default: $STREAMHOST_API_URL or https://api.github.com)')
      .option('--timeout <ms>', 'Per-request timeout in milliseconds')
      .option('--settle <ms>', 'Wait after creating the repository, in milliseconds')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Enable verbose output with detailed information')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (options: SetupCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: SetupCommandOptions): Promise<void> {
    try {
      const orchestrator = this.dependencyService.getSetupOrchestrator({
        cwd: options.dir,
        configFile: options.config,
        apiBaseUrl: options.apiUrl,
        timeoutMs: this.parseMilliseconds(options.timeout, '--timeout'),
        settleDelayMs: this.parseMilliseconds(options.settle, '--settle'),
        logLevel: this.logLevelFor(options),
        onTransition: (_from: SetupState, to: RunState) => this.showTransition(to, options),
      });

      if (!options.json && !options.quiet) {
        console.log('🚀 Provisioning streaming repository...\n');
      }

      const result = await orchestrator.run();

      if (result.error) {
        this.showSummary(result, options);
        this.handleError(`Setup halted in ${result.state}: ${result.error.message}`, options, result.error);
        return;
      }

      this.showSummary(result, options);

      if (!result.success) {
        const failed = result.secrets?.failed ?? [];
        this.handleError(`Setup finished with ${failed.length} failed secret(s): ${failed.join(', ')}`, options);
        return;
      }

      const repository = result.context.repository;
      this.handleSuccess(
        summarize(result),
        options,
        repository ? `Setup complete for ${repository.owner}/${repository.name}` : 'Setup complete',
      );
    } catch (error: unknown) {
      this.handleError(error instanceof Error ? error.message : String(error), options, error);
    }
  }

  private logLevelFor(options: SetupCommandOptions): LogLevel {
    if (options.json || options.quiet) return 'silent';
    return options.verbose ? 'debug' : 'warn';
  }

  private showTransition(to: RunState, options: SetupCommandOptions): void {
    if (options.json || options.quiet || !options.verbose) return;
    if (isSetupState(to)) {
      console.log(`⏳ ${to}: ${STATE_LABELS[to]}`);
    } else {
      console.log(`⛔ ${to}`);
    }
  }

  private showSummary(result: SetupRunResult, options: SetupCommandOptions): void {
    if (options.json || options.quiet) return;

    const { credentials, repository, repositoryOutcome } = result.context;
    if (credentials) {
      console.log(`🔐 Authenticated as ${credentials.login}`);
    }
    if (repository && repositoryOutcome) {
      console.log(`📦 Repository ${repository.owner}/${repository.name} ${repositoryOutcome}`);
    }

    if (result.files.length > 0) {
      console.log('\n📤 Files:');
      for (const file of result.files) {
        console.log(file.success
          ? `  ✅ ${file.path} (${file.revisionMarker ? 'updated' : 'created'})`
          : `  ❌ ${file.path} (HTTP ${file.status})`);
      }
    }

    if (result.secrets) {
      console.log('\n🔑 Secrets:');
      for (const outcome of result.secrets.outcomes) {
        console.log(outcome.success
          ? `  ✅ ${outcome.name}`
          : `  ❌ ${outcome.name}: ${outcome.error.message}`);
      }
    }
    console.log('');
  }
}

function isSetupState(state: RunState): state is SetupState {
  return !state.endsWith('.Failed');
}

/**
 * JSON-safe view of a run: names, paths and statuses, never config values
 */
export function summarize(result: SetupRunResult): Record<string, unknown> {
  return {
    state: result.state,
    repository: result.context.repository ?? null,
    repositoryOutcome: result.context.repositoryOutcome ?? null,
    files: result.files.map(file => ({ path: file.path, success: file.success, status: file.status })),
    secrets: result.secrets
      ? { keyId: result.secrets.keyId, succeeded: result.secrets.succeeded, failed: result.secrets.failed }
      : null,
  };
}
