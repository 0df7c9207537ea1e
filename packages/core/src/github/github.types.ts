/**
 * Wire types for the GitHub REST surface used by a provisioning run.
 *
 * Response bodies arrive as `unknown` from the RemoteClient; the readers
 * below narrow the few fields each caller needs.
 */

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to globalThis.fetch in production.
 * In tests, inject a mock function to avoid real HTTP calls.
 */
export type GitHubFetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Body of `POST /user/repos`
 * @see https://docs.github.com/en/rest/repos/repos#create-a-repository-for-the-authenticated-user
 */
export type GitHubCreateRepoRequest = {
  name: string;
  private: boolean;
  description: string;
  auto_init: boolean;
};

/**
 * Body of `PUT /repos/{owner}/{repo}/contents/{path}`
 * @see https://docs.github.com/en/rest/repos/contents#create-or-update-file-contents
 */
export type GitHubPutContentsRequest = {
  message: string;
  /** Base64-encoded file content */
  content: string;
  branch: string;
  /** Blob SHA of the file being replaced; required when the file exists */
  sha?: string;
};

/**
 * Response of `GET /repos/{owner}/{repo}/actions/secrets/public-key`
 */
export type GitHubPublicKeyResponse = {
  key_id: string;
  /** Base64-encoded Curve25519 public key */
  key: string;
};

/**
 * Body of `PUT /repos/{owner}/{repo}/actions/secrets/{secret_name}`
 */
export type GitHubPutSecretRequest = {
  /** Base64-encoded sealed box */
  encrypted_value: string;
  key_id: string;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a non-empty string field from a JSON body, or undefined.
 */
export function readStringField(data: unknown, field: string): string | undefined {
  if (!isRecord(data)) return undefined;
  const value = data[field];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function isPublicKeyResponse(data: unknown): data is GitHubPublicKeyResponse {
  return readStringField(data, 'key') !== undefined && readStringField(data, 'key_id') !== undefined;
}

/**
 * Encodes each segment of a repository path, keeping the separators.
 * `.github/workflows/live.yml` stays readable in the URL.
 */
export function encodeContentPath(path: string): string {
  return path
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}
