import type { Logger } from '../logger';
import type { CryptoSealer } from '../crypto';
import type { SecretWriteError } from '../errors';

/**
 * Plaintext values keyed by secret slot name. Never logged or persisted.
 */
export type SecretsMap = Readonly<Record<string, string>>;

export type SecretOutcome =
  | { name: string; success: true; status: number }
  | { name: string; success: false; error: SecretWriteError };

/**
 * Per-name result of a provisioning pass. Sealed values are not retained.
 */
export type SecretProvisioningReport = {
  /** Key identifier every secret was sealed against */
  keyId: string;
  outcomes: SecretOutcome[];
  succeeded: string[];
  failed: string[];
  /** Conjunction of every outcome */
  allSucceeded: boolean;
};

export type SecretProvisionerOptions = {
  sealer?: CryptoSealer;
  logger?: Logger;
};
