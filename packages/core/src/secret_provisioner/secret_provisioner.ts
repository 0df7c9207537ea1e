/**
 * SecretProvisioner - seals configuration values and stores them as Actions secrets
 *
 * The repository public key is fetched exactly once per pass and reused for
 * every secret. Slots are independent: a rejected write is recorded against
 * its name and the remaining slots are still written.
 *
 * @module secret_provisioner
 */

import type { RemoteClient } from '../remote_client';
import type { RepositoryRef } from '../repository_provisioner';
import type { GitHubPutSecretRequest } from '../github';
import type { EncryptionKey } from '../crypto';
import type { Logger } from '../logger';
import type {
  SecretOutcome,
  SecretProvisionerOptions,
  SecretProvisioningReport,
  SecretsMap,
} from './secret_provisioner.types';
import { repositoryPath } from '../repository_provisioner';
import { CryptoSealer, parseEncryptionKey } from '../crypto';
import { isPublicKeyResponse } from '../github';
import { createLogger } from '../logger';
import { ProvisionError, SecretWriteError } from '../errors';

const SECRET_WRITE_STATUSES: readonly number[] = [201, 204];

export class SecretProvisioner {
  private readonly sealer: CryptoSealer;
  private readonly logger: Logger;

  constructor(options: SecretProvisionerOptions = {}) {
    this.sealer = options.sealer ?? new CryptoSealer();
    this.logger = options.logger ?? createLogger('[SecretProvisioner] ');
  }

  /**
   * Fetches the repository public key.
   * @throws ProvisionError when the key cannot be fetched or the body is incomplete
   * @throws KeyFormatError when the key is malformed
   */
  async fetchPublicKey(client: RemoteClient, ref: RepositoryRef): Promise<EncryptionKey> {
    const path = `${repositoryPath(ref)}/actions/secrets/public-key`;
    const response = await client.call('GET', path);

    if (response.status !== 200) {
      throw new ProvisionError(
        `Cannot fetch the secrets public key of ${ref.owner}/${ref.name} (HTTP ${response.status})`,
        { operation: `GET ${path}`, status: response.status, responseBody: response.data },
      );
    }
    if (!isPublicKeyResponse(response.data)) {
      throw new ProvisionError(
        `Public key response of ${ref.owner}/${ref.name} is missing key or key_id`,
        { operation: `GET ${path}`, status: response.status, responseBody: response.data },
      );
    }

    return parseEncryptionKey(response.data.key_id, response.data.key);
  }

  /**
   * Seals and writes every entry of `secrets`.
   * Only the key fetch can throw; per-secret failures land in the report.
   */
  async provisionAll(client: RemoteClient, ref: RepositoryRef, secrets: SecretsMap): Promise<SecretProvisioningReport> {
    const key = await this.fetchPublicKey(client, ref);
    const outcomes: SecretOutcome[] = [];

    for (const [name, plaintext] of Object.entries(secrets)) {
      outcomes.push(await this.writeSecret(client, ref, key, name, plaintext));
    }

    const succeeded = outcomes.filter(o => o.success).map(o => o.name);
    const failed = outcomes.filter(o => !o.success).map(o => o.name);

    if (failed.length > 0) {
      this.logger.warn(`${failed.length} of ${outcomes.length} secrets failed: ${failed.join(', ')}`);
    }

    return {
      keyId: key.keyId,
      outcomes,
      succeeded,
      failed,
      allSucceeded: failed.length === 0,
    };
  }

  private async writeSecret(
    client: RemoteClient,
    ref: RepositoryRef,
    key: EncryptionKey,
    name: string,
    plaintext: string,
  ): Promise<SecretOutcome> {
    const path = `${repositoryPath(ref)}/actions/secrets/${encodeURIComponent(name)}`;
    const operation = `PUT ${path}`;

    let status: number;
    let responseBody: unknown;
    try {
      const request: GitHubPutSecretRequest = {
        encrypted_value: await this.sealer.seal(key, plaintext),
        key_id: key.keyId,
      };
      const response = await client.call('PUT', path, request);
      status = response.status;
      responseBody = response.data;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Secret ${name} not written: ${message}`);
      return {
        name,
        success: false,
        error: new SecretWriteError(name, `Failed to write secret ${name}: ${message}`, { operation, cause: error }),
      };
    }

    if (SECRET_WRITE_STATUSES.includes(status)) {
      this.logger.info(`Secret ${name} ${status === 201 ? 'created' : 'updated'}`);
      return { name, success: true, status };
    }

    this.logger.warn(`Secret ${name} rejected (HTTP ${status})`);
    return {
      name,
      success: false,
      error: new SecretWriteError(name, `Failed to write secret ${name} (HTTP ${status})`, {
        operation,
        status,
        responseBody,
      }),
    };
  }
}
