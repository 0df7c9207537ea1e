/**
 * MemoryRemoteClient - in-process stand-in for the GitHub REST surface
 *
 * Keeps repositories, file contents and secrets in maps and answers the
 * endpoints a provisioning run uses with the statuses GitHub returns.
 * Every call is recorded so tests can assert on the exact sequence.
 *
 * @example
 * ```typescript
 * const github = new MemoryRemoteClient({ login: 'octo', publicKey: { key, key_id: 'kid-1' } });
 * github.respondWith('PUT', '/repos/octo/stream/actions/secrets/VIDEO_URL', 500);
 * ```
 */

import type { HttpMethod, RemoteClient, RemoteResponse } from '../remote_client';
import type { GitHubPublicKeyResponse } from '../github';
import { readStringField } from '../github';

export type RecordedCall = {
  method: HttpMethod;
  path: string;
  body: unknown;
};

export type StoredFile = {
  content: string;
  sha: string;
};

export type MemoryRemoteClientOptions = {
  /** Account handle returned by GET /user */
  login: string;
  /** Key served by the public-key endpoint of every repository */
  publicKey: GitHubPublicKeyResponse;
  /** When false, GET /user answers 401 */
  authorized?: boolean;
};

type Override = {
  method: HttpMethod;
  path: string;
  response: RemoteResponse;
};

const REPO_PATH = /^\/repos\/([^/]+)\/([^/]+)$/;
const CONTENTS_PATH = /^\/repos\/([^/]+)\/([^/]+)\/contents\/(.+)$/;
const PUBLIC_KEY_PATH = /^\/repos\/([^/]+)\/([^/]+)\/actions\/secrets\/public-key$/;
const SECRET_PATH = /^\/repos\/([^/]+)\/([^/]+)\/actions\/secrets\/([^/]+)$/;

export class MemoryRemoteClient implements RemoteClient {
  readonly calls: RecordedCall[] = [];

  private readonly login: string;
  private readonly publicKey: GitHubPublicKeyResponse;
  private readonly authorized: boolean;
  private readonly repositories = new Set<string>();
  private readonly files = new Map<string, StoredFile>();
  private readonly secrets = new Map<string, GitHubPublicKeyResponse & { encrypted_value: string }>();
  private readonly overrides: Override[] = [];
  private blobCounter = 0;

  constructor(options: MemoryRemoteClientOptions) {
    this.login = options.login;
    this.publicKey = options.publicKey;
    this.authorized = options.authorized ?? true;
  }

  // ==================== Test Helpers ====================

  seedRepository(owner: string, name: string): void {
    this.repositories.add(`${owner}/${name}`);
  }

  hasRepository(owner: string, name: string): boolean {
    return this.repositories.has(`${owner}/${name}`);
  }

  /** Stores a file and returns its blob marker */
  seedFile(owner: string, name: string, path: string, content: string): string {
    const sha = this.nextSha();
    this.files.set(fileKey(owner, name, path), { content, sha });
    return sha;
  }

  getFile(owner: string, name: string, path: string): StoredFile | undefined {
    return this.files.get(fileKey(owner, name, path));
  }

  getSecret(owner: string, name: string, secretName: string): { encrypted_value: string; key_id: string } | undefined {
    const stored = this.secrets.get(`${owner}/${name}:${secretName}`);
    return stored ? { encrypted_value: stored.encrypted_value, key_id: stored.key_id } : undefined;
  }

  /** Answers every later call to `method path` with the given status */
  respondWith(method: HttpMethod, path: string, status: number, data: unknown = { message: `HTTP ${status}` }): void {
    this.overrides.push({ method, path, response: { status, data } });
  }

  callsTo(method: HttpMethod, path: string): RecordedCall[] {
    return this.calls.filter(call => call.method === method && call.path === path);
  }

  // ==================== RemoteClient ====================

  async call(method: HttpMethod, resourcePath: string, body?: unknown): Promise<RemoteResponse> {
    this.calls.push({ method, path: resourcePath, body });

    const override = this.overrides.find(o => o.method === method && o.path === resourcePath);
    if (override) {
      return override.response;
    }

    if (resourcePath === '/user' && method === 'GET') {
      return this.authorized
        ? { status: 200, data: { login: this.login } }
        : { status: 401, data: { message: 'Bad credentials' } };
    }

    if (resourcePath === '/user/repos' && method === 'POST') {
      return this.createRepository(body);
    }

    const publicKey = PUBLIC_KEY_PATH.exec(resourcePath);
    if (publicKey && method === 'GET') {
      return this.repositoryExists(publicKey)
        ? { status: 200, data: { ...this.publicKey } }
        : notFound();
    }

    const secret = SECRET_PATH.exec(resourcePath);
    if (secret && method === 'PUT') {
      return this.putSecret(secret, body);
    }

    const contents = CONTENTS_PATH.exec(resourcePath);
    if (contents) {
      if (method === 'GET') return this.getContents(contents);
      if (method === 'PUT') return this.putContents(contents, body);
    }

    const repo = REPO_PATH.exec(resourcePath);
    if (repo && method === 'GET') {
      return this.repositoryExists(repo)
        ? { status: 200, data: { full_name: `${repo[1]}/${repo[2]}` } }
        : notFound();
    }

    return notFound();
  }

  // ==================== Endpoints ====================

  private createRepository(body: unknown): RemoteResponse {
    const name = readStringField(body, 'name');
    if (!name) {
      return { status: 422, data: { message: 'Repository creation failed.' } };
    }
    const fullName = `${this.login}/${name}`;
    if (this.repositories.has(fullName)) {
      return { status: 422, data: { message: 'name already exists on this account' } };
    }
    this.repositories.add(fullName);
    return { status: 201, data: { full_name: fullName } };
  }

  private getContents(match: RegExpExecArray): RemoteResponse {
    if (!this.repositoryExists(match)) return notFound();
    const stored = this.files.get(fileKeyFromMatch(match));
    if (!stored) return notFound();
    return {
      status: 200,
      data: {
        path: decodePath(match[3] ?? ''),
        sha: stored.sha,
        content: Buffer.from(stored.content).toString('base64'),
        encoding: 'base64',
      },
    };
  }

  private putContents(match: RegExpExecArray, body: unknown): RemoteResponse {
    if (!this.repositoryExists(match)) return notFound();

    const content = readStringField(body, 'content') ?? '';
    const sha = readStringField(body, 'sha');
    const key = fileKeyFromMatch(match);
    const existing = this.files.get(key);

    if (existing && sha === undefined) {
      return { status: 422, data: { message: 'Invalid request.\n\n"sha" wasn\'t supplied.' } };
    }
    if (existing && sha !== existing.sha) {
      return { status: 409, data: { message: `${decodePath(match[3] ?? '')} does not match ${sha ?? ''}` } };
    }

    const stored: StoredFile = {
      content: Buffer.from(content, 'base64').toString('utf-8'),
      sha: this.nextSha(),
    };
    this.files.set(key, stored);
    return { status: existing ? 200 : 201, data: { content: { sha: stored.sha } } };
  }

  private putSecret(match: RegExpExecArray, body: unknown): RemoteResponse {
    if (!this.repositoryExists(match)) return notFound();
    const encryptedValue = readStringField(body, 'encrypted_value');
    const keyId = readStringField(body, 'key_id');
    if (!encryptedValue || keyId !== this.publicKey.key_id) {
      return { status: 422, data: { message: 'Invalid request.' } };
    }
    const key = `${match[1]}/${match[2]}:${match[3]}`;
    const existed = this.secrets.has(key);
    this.secrets.set(key, { key: this.publicKey.key, key_id: keyId, encrypted_value: encryptedValue });
    return { status: existed ? 204 : 201, data: null };
  }

  private repositoryExists(match: RegExpExecArray): boolean {
    return this.repositories.has(`${match[1]}/${match[2]}`);
  }

  private nextSha(): string {
    this.blobCounter += 1;
    return `blob-${this.blobCounter}`;
  }
}

function notFound(): RemoteResponse {
  return { status: 404, data: { message: 'Not Found' } };
}

function decodePath(encoded: string): string {
  return encoded.split('/').map(segment => decodeURIComponent(segment)).join('/');
}

function fileKey(owner: string, name: string, path: string): string {
  return `${owner}/${name}:${path}`;
}

function fileKeyFromMatch(match: RegExpExecArray): string {
  return fileKey(match[1] ?? '', match[2] ?? '', decodePath(match[3] ?? ''));
}
