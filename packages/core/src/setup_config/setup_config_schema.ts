import type { JSONSchemaType } from 'ajv';
import type { SetupConfig } from './setup_config.types';

export const SETUP_CONFIG_SCHEMA: JSONSchemaType<SetupConfig> = {
  type: 'object',
  properties: {
    streamKey: { type: 'string', minLength: 1 },
    videoUrl: { type: 'string', minLength: 1, format: 'uri' },
    quality: { type: 'string', minLength: 1 },
    aspectRatio: { type: 'string', minLength: 1 },
    token: { type: 'string', minLength: 1 },
    repoName: { type: 'string', pattern: '^[A-Za-z0-9._-]{1,100}$' },
  },
  required: ['streamKey', 'videoUrl', 'quality', 'aspectRatio', 'token', 'repoName'],
  additionalProperties: false,
};
