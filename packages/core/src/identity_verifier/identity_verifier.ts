import type { RemoteClient } from '../remote_client';
import type { Logger } from '../logger';
import type { Credentials, IdentityVerifierOptions } from './identity_verifier.types';
import { readStringField } from '../github';
import { createLogger } from '../logger';
import { AuthError } from '../errors';

/**
 * Confirms the token is accepted and resolves the account that owns it.
 * Runs before any mutating call.
 */
export class IdentityVerifier {
  private readonly logger: Logger;

  constructor(options: IdentityVerifierOptions = {}) {
    this.logger = options.logger ?? createLogger('[IdentityVerifier] ');
  }

  /**
   * @throws AuthError unless GET /user answers 200 with a login
   * @throws TransportError on network faults
   */
  async verify(client: RemoteClient, token: string): Promise<Credentials> {
    const response = await client.call('GET', '/user');

    if (response.status !== 200) {
      throw new AuthError(`Token rejected by GET /user (HTTP ${response.status})`, {
        operation: 'GET /user',
        status: response.status,
        responseBody: response.data,
      });
    }

    const login = readStringField(response.data, 'login');
    if (login === undefined) {
      throw new AuthError('GET /user answered without a login', {
        operation: 'GET /user',
        status: response.status,
        responseBody: response.data,
      });
    }

    this.logger.info(`Authenticated as ${login}`);
    return Object.freeze({ token, login });
  }
}
