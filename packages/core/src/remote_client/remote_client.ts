/**
 * GitHubRemoteClient - fetch-based implementation of RemoteClient
 *
 * Attaches the bearer token and the API version headers to every call and
 * returns the status with the decoded body. Network faults and timeouts are
 * the only failures; an HTTP error status is returned like any other.
 *
 * @module remote_client
 */

import type { GitHubFetchFn } from '../github';
import type { Logger } from '../logger';
import type { GitHubRemoteClientOptions, HttpMethod, RemoteClient, RemoteResponse } from './remote_client.types';
import { createLogger } from '../logger';
import { TransportError } from '../errors';
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  GITHUB_ACCEPT_HEADER,
  GITHUB_API_VERSION,
} from '../constants';

/**
 * @example
 * ```typescript
 * const client = new GitHubRemoteClient({ token });
 * const { status, data } = await client.call('GET', '/user');
 * ```
 */
export class GitHubRemoteClient implements RemoteClient {
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: GitHubFetchFn;
  private readonly logger: Logger;

  constructor(options: GitHubRemoteClientOptions, fetchFn?: GitHubFetchFn) {
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? createLogger('[RemoteClient] ');
  }

  async call(method: HttpMethod, resourcePath: string, body?: unknown): Promise<RemoteResponse> {
    const operation = `${method} ${resourcePath}`;
    const init: RequestInit = {
      method,
      headers: this.buildHeaders(body !== undefined),
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    this.logger.debug(operation);

    try {
      const response = await this.fetchFn(this.buildUrl(resourcePath), init);
      const data = parseBody(await response.text());
      this.logger.debug(`${operation} -> ${response.status}`);
      return { status: response.status, data };
    } catch (error: unknown) {
      throw new TransportError(`Network error during ${operation}: ${describeFault(error, this.timeoutMs)}`, {
        operation,
        cause: error,
      });
    }
  }

  /** Build absolute URL for a resource path */
  private buildUrl(resourcePath: string): string {
    const path = resourcePath.startsWith('/') ? resourcePath : `/${resourcePath}`;
    return `${this.apiBaseUrl}${path}`;
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.token}`,
      'Accept': GITHUB_ACCEPT_HEADER,
      'X-GitHub-Api-Version': GITHUB_API_VERSION,
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Not JSON (HTML error pages from proxies, plain text)
    return text;
  }
}

function describeFault(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `request timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : String(error);
}
