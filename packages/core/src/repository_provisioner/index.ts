export { RepositoryProvisioner, repositoryPath, sleep } from './repository_provisioner';
export type {
  RepositoryRef,
  ProvisionOutcome,
  RepositoryProvisionerOptions,
} from './repository_provisioner.types';
