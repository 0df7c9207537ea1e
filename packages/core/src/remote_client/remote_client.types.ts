import type { Logger } from '../logger';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

/**
 * Outcome of a single round trip. Any HTTP status, 2xx or not, is a
 * normal response; interpreting it is the caller's job.
 */
export type RemoteResponse = {
  status: number;
  /** Parsed JSON body, raw text when the body is not JSON, null when empty */
  data: unknown;
};

/**
 * Authenticated client for the provider's resource-oriented API.
 * Never retries and never sleeps; one call is one round trip.
 */
export interface RemoteClient {
  /**
   * @param resourcePath - Path below the API base URL, starting with `/`
   * @param body - JSON-serialisable request body
   * @throws TransportError on network faults and timeouts
   */
  call(method: HttpMethod, resourcePath: string, body?: unknown): Promise<RemoteResponse>;
}

/**
 * Options for GitHubRemoteClient
 */
export type GitHubRemoteClientOptions = {
  /** Personal access token */
  token: string;
  /** GitHub API base URL (default: 'https://api.github.com') */
  apiBaseUrl?: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
};
