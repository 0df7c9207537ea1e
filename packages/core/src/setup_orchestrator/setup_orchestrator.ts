/**
 * SetupOrchestrator - drives one provisioning run through its states
 *
 * Init → FilesChecked → ConfigLoaded → TokenVerified → RepoProvisioned →
 * FilesUploaded → SecretsProvisioned → Done
 *
 * A failing guard halts the run in `<State>.Failed` with the error; nothing is
 * rolled back. Every step is idempotent, so a halted run is simply re-run.
 * Secret slots that fail individually do not halt the run: it still reaches
 * Done, with `success` false.
 *
 * @module setup_orchestrator
 */

import type { Logger } from '../logger';
import type { RemoteClient } from '../remote_client';
import type { WorkloadSource } from '../workload';
import type { SetupConfigSource } from '../setup_config';
import type { FileUploadRecord } from '../file_syncer';
import type {
  FailedState,
  RunContext,
  RunState,
  SetupOrchestratorDependencies,
  SetupRunResult,
  SetupState,
} from './setup_orchestrator.types';
import { IdentityVerifier } from '../identity_verifier';
import { RepositoryProvisioner } from '../repository_provisioner';
import { FileSyncer, contentsPath } from '../file_syncer';
import { SecretProvisioner } from '../secret_provisioner';
import { secretsFromConfig } from '../setup_config';
import { ensureSealingAvailable } from '../crypto';
import { createLogger } from '../logger';
import { ConfigError, UploadError, isSetupError } from '../errors';

export class SetupOrchestrator {
  private readonly workload: WorkloadSource;
  private readonly configSource: SetupConfigSource;
  private readonly createClient: (token: string) => RemoteClient;
  private readonly identityVerifier: IdentityVerifier;
  private readonly repositoryProvisioner: RepositoryProvisioner;
  private readonly fileSyncer: FileSyncer;
  private readonly secretProvisioner: SecretProvisioner;
  private readonly ensureSealing: () => Promise<void>;
  private readonly onTransition: ((from: SetupState, to: RunState) => void) | undefined;
  private readonly logger: Logger;

  constructor(deps: SetupOrchestratorDependencies) {
    this.workload = deps.workload;
    this.configSource = deps.configSource;
    this.createClient = deps.createClient;
    this.identityVerifier = deps.identityVerifier ?? new IdentityVerifier();
    this.repositoryProvisioner = deps.repositoryProvisioner ?? new RepositoryProvisioner();
    this.fileSyncer = deps.fileSyncer ?? new FileSyncer();
    this.secretProvisioner = deps.secretProvisioner ?? new SecretProvisioner();
    this.ensureSealing = deps.ensureSealing ?? ensureSealingAvailable;
    this.onTransition = deps.onTransition;
    this.logger = deps.logger ?? createLogger('[SetupOrchestrator] ');
  }

  /**
   * Executes a full run. Never throws a SetupError: it is returned on the
   * result together with the state the run halted in.
   */
  async run(): Promise<SetupRunResult> {
    const progress: { state: SetupState } = { state: 'Init' };
    let context: RunContext = Object.freeze({});
    const files: FileUploadRecord[] = [];

    const advance = (next: SetupState): void => {
      this.logger.debug(`${progress.state} → ${next}`);
      this.onTransition?.(progress.state, next);
      progress.state = next;
    };

    try {
      // Init: local guards, no network
      await this.ensureSealing();
      await this.checkWorkload();
      advance('FilesChecked');

      const config = await this.configSource.load();
      context = Object.freeze({ ...context, config });
      advance('ConfigLoaded');

      const client = this.createClient(config.token);
      const credentials = await this.identityVerifier.verify(client, config.token);
      const repository = Object.freeze({ owner: credentials.login, name: config.repoName });
      context = Object.freeze({ ...context, credentials, repository });
      advance('TokenVerified');

      const repositoryOutcome = await this.repositoryProvisioner.ensure(client, repository);
      context = Object.freeze({ ...context, repositoryOutcome });
      advance('RepoProvisioned');

      for (const filePath of this.workload.trackedFiles) {
        const artifact = await this.workload.read(filePath);
        const record = await this.fileSyncer.upload(client, repository, artifact.path, artifact.content);
        files.push(record);
        if (!record.success) {
          throw new UploadError(filePath, `Upload of ${filePath} failed (HTTP ${record.status})`, {
            operation: `PUT ${contentsPath(repository, filePath)}`,
            status: record.status,
            responseBody: record.responseBody,
          });
        }
      }
      advance('FilesUploaded');

      const report = await this.secretProvisioner.provisionAll(client, repository, secretsFromConfig(config));
      advance('SecretsProvisioned');
      advance('Done');

      return { state: progress.state, context, files, secrets: report, success: report.allSucceeded };
    } catch (error: unknown) {
      if (!isSetupError(error)) {
        throw error;
      }
      const failed: FailedState = `${progress.state}.Failed`;
      this.logger.error(`Run halted in ${failed}: ${error.message}`);
      this.onTransition?.(progress.state, failed);
      return { state: failed, context, files, success: false, error };
    }
  }

  /**
   * Runs the local guards only (sealing capability, workload files, setup
   * config) without touching the network.
   */
  async check(): Promise<SetupRunResult> {
    let state: SetupState = 'Init';
    let context: RunContext = Object.freeze({});
    try {
      await this.ensureSealing();
      await this.checkWorkload();
      state = 'FilesChecked';
      const config = await this.configSource.load();
      context = Object.freeze({ config });
      state = 'ConfigLoaded';
    } catch (error: unknown) {
      if (!isSetupError(error)) {
        throw error;
      }
      return { state: `${state}.Failed`, context, files: [], success: false, error };
    }
    return { state, context, files: [], success: true };
  }

  private async checkWorkload(): Promise<void> {
    const { found, missing } = await this.workload.check();
    for (const filePath of found) {
      this.logger.info(`Found ${filePath}`);
    }
    if (missing.length > 0) {
      throw new ConfigError(`Missing required files: ${missing.join(', ')}`, missing[0]);
    }
  }
}
