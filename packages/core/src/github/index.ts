/**
 * Shared GitHub wire types and readers.
 */
export type {
  GitHubFetchFn,
  GitHubCreateRepoRequest,
  GitHubPutContentsRequest,
  GitHubPublicKeyResponse,
  GitHubPutSecretRequest,
} from './github.types';

export {
  isRecord,
  readStringField,
  isPublicKeyResponse,
  encodeContentPath,
} from './github.types';
