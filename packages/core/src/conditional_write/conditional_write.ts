/**
 * conditionalWrite - read the current revision marker, then write with it
 *
 * The provider only accepts an overwrite that echoes the marker of the
 * content being replaced. The probe and the write are two separate calls, so
 * a concurrent writer between them makes the write fail with a conflict
 * status, surfaced here as ConditionalWriteConflict for the caller to map or
 * retry.
 *
 * @module conditional_write
 */

import type { ConditionalWriteOptions, ConditionalWriteResult } from './conditional_write.types';
import { readStringField } from '../github';

const DEFAULT_SUCCESS_STATUSES: readonly number[] = [200, 201];
const DEFAULT_CONFLICT_STATUSES: readonly number[] = [409];

/**
 * The write was rejected because the remote marker changed (or was required
 * and missing). Retryable by the caller with a fresh probe.
 */
export class ConditionalWriteConflict extends Error {
  constructor(
    public readonly resourcePath: string,
    /** Marker sent with the rejected write */
    public readonly marker: string | undefined,
    public readonly status: number,
    public readonly responseBody: unknown,
  ) {
    super(`Conflict writing ${resourcePath} (HTTP ${status})`);
    this.name = 'ConditionalWriteConflict';
    Object.setPrototypeOf(this, ConditionalWriteConflict.prototype);
  }
}

/**
 * Reads the marker of the resource, or undefined when the probe does not
 * return 200 (absent resource, or a probe that failed).
 */
export async function probeMarker(
  options: Pick<ConditionalWriteOptions<unknown>, 'client' | 'resourcePath' | 'markerField'>,
): Promise<string | undefined> {
  const probe = await options.client.call('GET', options.resourcePath);
  if (probe.status !== 200) {
    return undefined;
  }
  return readStringField(probe.data, options.markerField ?? 'sha');
}

export async function conditionalWrite<TBody>(options: ConditionalWriteOptions<TBody>): Promise<ConditionalWriteResult> {
  const successStatuses = options.successStatuses ?? DEFAULT_SUCCESS_STATUSES;
  const conflictStatuses = options.conflictStatuses ?? DEFAULT_CONFLICT_STATUSES;

  const marker = await probeMarker(options);
  const response = await options.client.call('PUT', options.resourcePath, options.buildBody(marker));

  if (conflictStatuses.includes(response.status)) {
    throw new ConditionalWriteConflict(options.resourcePath, marker, response.status, response.data);
  }

  return {
    status: response.status,
    data: response.data,
    success: successStatuses.includes(response.status),
    marker,
  };
}
