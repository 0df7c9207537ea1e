import type { Logger } from '../logger';
import type { RemoteClient } from '../remote_client';
import type { WorkloadSource } from '../workload';
import type { SetupConfig, SetupConfigSource } from '../setup_config';
import type { Credentials, IdentityVerifier } from '../identity_verifier';
import type { ProvisionOutcome, RepositoryProvisioner, RepositoryRef } from '../repository_provisioner';
import type { FileSyncer, FileUploadRecord } from '../file_syncer';
import type { SecretProvisioner, SecretProvisioningReport } from '../secret_provisioner';
import type { SetupError } from '../errors';

/**
 * Progress of a run, in order. Each state is reached only when the guard of
 * the previous one held.
 */
export type SetupState =
  | 'Init'
  | 'FilesChecked'
  | 'ConfigLoaded'
  | 'TokenVerified'
  | 'RepoProvisioned'
  | 'FilesUploaded'
  | 'SecretsProvisioned'
  | 'Done';

/** A run halted while leaving this state */
export type FailedState = `${SetupState}.Failed`;

export type RunState = SetupState | FailedState;

/**
 * Immutable snapshot of what the run has resolved so far. A new snapshot is
 * built at every transition; components receive the values they need.
 */
export type RunContext = Readonly<{
  config?: SetupConfig;
  credentials?: Credentials;
  repository?: RepositoryRef;
  repositoryOutcome?: ProvisionOutcome;
}>;

export type SetupRunResult = {
  state: RunState;
  context: RunContext;
  /** One record per attempted upload, in tracked order */
  files: FileUploadRecord[];
  secrets?: SecretProvisioningReport;
  /** Reached Done and every secret was written */
  success: boolean;
  /** Error that halted the run */
  error?: SetupError;
};

export type SetupOrchestratorDependencies = {
  workload: WorkloadSource;
  configSource: SetupConfigSource;
  /** Builds the authenticated client once the token is known */
  createClient: (token: string) => RemoteClient;
  identityVerifier?: IdentityVerifier;
  repositoryProvisioner?: RepositoryProvisioner;
  fileSyncer?: FileSyncer;
  secretProvisioner?: SecretProvisioner;
  /** Capability check run before anything else (default: libsodium readiness) */
  ensureSealing?: () => Promise<void>;
  /** Called on every transition, including the one into a failed state */
  onTransition?: (from: SetupState, to: RunState) => void;
  logger?: Logger;
};
