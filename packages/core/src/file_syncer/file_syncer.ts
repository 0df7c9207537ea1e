/**
 * FileSyncer - mirrors local files into the repository via the Contents API
 *
 * Each upload probes the path for its current blob SHA and echoes it on the
 * write, so re-running against a populated repository overwrites instead of
 * failing. Probe and write are not atomic: a concurrent writer in between
 * turns into an UploadConflict, which halts the run.
 *
 * @module file_syncer
 */

import type { RemoteClient } from '../remote_client';
import type { RepositoryRef } from '../repository_provisioner';
import type { GitHubPutContentsRequest } from '../github';
import type { Logger } from '../logger';
import type { FileSyncerOptions, FileUploadRecord } from './file_syncer.types';
import type { ConditionalWriteResult } from '../conditional_write';
import { repositoryPath } from '../repository_provisioner';
import { conditionalWrite, ConditionalWriteConflict } from '../conditional_write';
import { encodeContentPath, readStringField } from '../github';
import { createLogger } from '../logger';
import { UploadConflict } from '../errors';
import { DEFAULT_BRANCH } from '../constants';

export function contentsPath(ref: RepositoryRef, path: string): string {
  return `${repositoryPath(ref)}/contents/${encodeContentPath(path)}`;
}

export class FileSyncer {
  private readonly branch: string;
  private readonly commitMessage: (path: string) => string;
  private readonly logger: Logger;

  constructor(options: FileSyncerOptions = {}) {
    this.branch = options.branch ?? DEFAULT_BRANCH;
    this.commitMessage = options.commitMessage ?? (path => `Upload ${path}`);
    this.logger = options.logger ?? createLogger('[FileSyncer] ');
  }

  /**
   * Uploads `content` to `path`, including the discovered revision marker
   * when the path already holds content.
   *
   * @returns success iff the write answered 200 or 201
   * @throws UploadConflict when the marker no longer matches
   * @throws TransportError on network faults
   */
  async upload(client: RemoteClient, ref: RepositoryRef, path: string, content: Uint8Array): Promise<FileUploadRecord> {
    const resourcePath = contentsPath(ref, path);
    const encoded = Buffer.from(content).toString('base64');

    let result: ConditionalWriteResult;
    try {
      result = await conditionalWrite<GitHubPutContentsRequest>({
        client,
        resourcePath,
        buildBody: marker => {
          const body: GitHubPutContentsRequest = {
            message: this.commitMessage(path),
            content: encoded,
            branch: this.branch,
          };
          if (marker !== undefined) {
            body.sha = marker;
          }
          return body;
        },
      });
    } catch (error: unknown) {
      if (error instanceof ConditionalWriteConflict) {
        throw new UploadConflict(path, error.marker, {
          operation: `PUT ${resourcePath}`,
          status: error.status,
          responseBody: error.responseBody,
        });
      }
      throw error;
    }

    if (result.status === 422 && isMissingMarkerRejection(result.data)) {
      // Content appeared between probe and write
      throw new UploadConflict(path, result.marker, {
        operation: `PUT ${resourcePath}`,
        status: result.status,
        responseBody: result.data,
      });
    }

    const record: FileUploadRecord = { path, success: result.success, status: result.status };
    if (result.marker !== undefined) {
      record.revisionMarker = result.marker;
    }
    if (!result.success) {
      record.responseBody = result.data;
      this.logger.warn(`Upload of ${path} failed (HTTP ${result.status})`);
    } else {
      this.logger.info(`Uploaded ${path}${result.marker ? ' (updated)' : ''}`);
    }
    return record;
  }
}

function isMissingMarkerRejection(data: unknown): boolean {
  const message = readStringField(data, 'message');
  return message !== undefined && message.includes('"sha"');
}
