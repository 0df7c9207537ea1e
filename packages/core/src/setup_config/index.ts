export { parseSetupConfig, validateSetupConfig, secretsFromConfig } from './setup_config';
export { SETUP_CONFIG_SCHEMA } from './setup_config_schema';
export { FsSetupConfigSource } from './fs/fs_setup_config_source';
export type { SetupConfig, SetupConfigSource, FsSetupConfigSourceOptions } from './setup_config.types';
