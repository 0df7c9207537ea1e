import type { RemoteClient } from '../remote_client';
import type { GitHubCreateRepoRequest } from '../github';
import type { Logger } from '../logger';
import type { ProvisionOutcome, RepositoryProvisionerOptions, RepositoryRef } from './repository_provisioner.types';
import { createLogger } from '../logger';
import { ProvisionError } from '../errors';
import { DEFAULT_SETTLE_DELAY_MS, REPOSITORY_DESCRIPTION } from '../constants';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function repositoryPath(ref: RepositoryRef): string {
  return `/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}`;
}

/**
 * Ensures the target repository exists: reuses it untouched when present,
 * creates it (public, auto-initialised default branch) when absent.
 */
export class RepositoryProvisioner {
  private readonly description: string;
  private readonly settleDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: RepositoryProvisionerOptions = {}) {
    this.description = options.description ?? REPOSITORY_DESCRIPTION;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('[RepositoryProvisioner] ');
  }

  /**
   * @throws ProvisionError when the probe or the creation answers anything but 200/404 and 201
   * @throws TransportError on network faults
   */
  async ensure(client: RemoteClient, ref: RepositoryRef): Promise<ProvisionOutcome> {
    const probePath = repositoryPath(ref);
    const probe = await client.call('GET', probePath);

    if (probe.status === 200) {
      this.logger.info(`Repository ${ref.owner}/${ref.name} already exists, reusing it`);
      return 'reused';
    }

    if (probe.status !== 404) {
      throw new ProvisionError(
        `Could not check repository ${ref.owner}/${ref.name} (HTTP ${probe.status})`,
        { operation: `GET ${probePath}`, status: probe.status, responseBody: probe.data },
      );
    }

    const request: GitHubCreateRepoRequest = {
      name: ref.name,
      private: false,
      description: this.description,
      auto_init: true,
    };
    const created = await client.call('POST', '/user/repos', request);

    if (created.status !== 201) {
      throw new ProvisionError(
        `Repository creation failed for ${ref.owner}/${ref.name} (HTTP ${created.status})`,
        { operation: 'POST /user/repos', status: created.status, responseBody: created.data },
      );
    }

    this.logger.info(`Repository ${ref.owner}/${ref.name} created`);
    // Contents of a fresh repository are not immediately writable
    if (this.settleDelayMs > 0) {
      await this.sleep(this.settleDelayMs);
    }
    return 'created';
  }
}
