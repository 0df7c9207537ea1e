export { GitHubRemoteClient } from './remote_client';
export type {
  HttpMethod,
  RemoteResponse,
  RemoteClient,
  GitHubRemoteClientOptions,
} from './remote_client.types';
