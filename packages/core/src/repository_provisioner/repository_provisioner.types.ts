import type { Logger } from '../logger';

/**
 * Identifies the single target repository of a run
 */
export type RepositoryRef = {
  /** Account handle of the authenticated user */
  owner: string;
  name: string;
};

export type ProvisionOutcome = 'reused' | 'created';

export type RepositoryProvisionerOptions = {
  /** Repository description used on creation */
  description?: string;
  /** Wait after creation before content operations (default: 2000) */
  settleDelayMs?: number;
  /** Injected for tests; defaults to a timer-based sleep */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};
