export * as Errors from "./errors";
export * as Logger from "./logger";
export * as Constants from "./constants";
export * as GitHub from "./github";
export * as Crypto from "./crypto";

// Remote access
export { GitHubRemoteClient } from "./remote_client";
export type { RemoteClient, RemoteResponse, HttpMethod, GitHubRemoteClientOptions } from "./remote_client";
export { conditionalWrite, probeMarker, ConditionalWriteConflict } from "./conditional_write";
export type { ConditionalWriteOptions, ConditionalWriteResult } from "./conditional_write";

// Provisioning components
export { IdentityVerifier } from "./identity_verifier";
export type { Credentials } from "./identity_verifier";
export { RepositoryProvisioner, repositoryPath } from "./repository_provisioner";
export type { RepositoryRef, ProvisionOutcome, RepositoryProvisionerOptions } from "./repository_provisioner";
export { FileSyncer, contentsPath } from "./file_syncer";
export type { FileArtifact, FileUploadRecord, FileSyncerOptions } from "./file_syncer";
export { CryptoSealer, parseEncryptionKey, ensureSealingAvailable } from "./crypto";
export type { EncryptionKey } from "./crypto";
export { SecretProvisioner } from "./secret_provisioner";
export type { SecretsMap, SecretOutcome, SecretProvisioningReport } from "./secret_provisioner";

// Local inputs
export { parseSetupConfig, validateSetupConfig, secretsFromConfig, FsSetupConfigSource } from "./setup_config";
export type { SetupConfig, SetupConfigSource } from "./setup_config";
export { FsWorkloadSource, MemoryWorkloadSource } from "./workload";
export type { WorkloadSource, WorkloadCheck } from "./workload";

// Run
export { SetupOrchestrator } from "./setup_orchestrator";
export type {
  SetupState,
  FailedState,
  RunState,
  RunContext,
  SetupRunResult,
  SetupOrchestratorDependencies,
} from "./setup_orchestrator";

// In-memory stand-ins
export { MemoryRemoteClient } from "./memory";

export {
  SetupError,
  ConfigError,
  AuthError,
  ProvisionError,
  TransportError,
  UploadError,
  UploadConflict,
  KeyFormatError,
  SecretWriteError,
  isSetupError,
} from "./errors";
export type { SetupErrorCode } from "./errors";
export { createLogger } from "./logger";
export type { Logger as LoggerInstance, LogLevel } from "./logger";
export {
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  SETUP_FILE_NAME,
  TRACKED_FILES,
  SECRET_NAMES,
} from "./constants";
