export {
  SetupError,
  ConfigError,
  AuthError,
  ProvisionError,
  TransportError,
  UploadError,
  UploadConflict,
  KeyFormatError,
  SecretWriteError,
  isSetupError,
} from './errors';
export type { SetupErrorCode, SetupErrorDetails } from './errors';
