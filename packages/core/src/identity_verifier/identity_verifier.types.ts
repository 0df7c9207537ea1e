import type { Logger } from '../logger';

/**
 * Authenticated identity of a run. Obtained once, never mutated.
 */
export type Credentials = {
  token: string;
  /** Account handle returned by GET /user */
  login: string;
};

export type IdentityVerifierOptions = {
  logger?: Logger;
};
