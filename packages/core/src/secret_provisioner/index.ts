export { SecretProvisioner } from './secret_provisioner';
export type {
  SecretsMap,
  SecretOutcome,
  SecretProvisioningReport,
  SecretProvisionerOptions,
} from './secret_provisioner.types';
