/**
 * Setup file parsing and validation.
 *
 * The file holds six non-empty lines: stream key, video URL, quality,
 * aspect ratio, token and repository name. Blank lines and surrounding
 * whitespace are ignored. Validation errors name the field, never its value.
 *
 * @module setup_config
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { SetupConfig } from './setup_config.types';
import type { SecretName } from '../constants';
import { SETUP_CONFIG_SCHEMA } from './setup_config_schema';
import { ConfigError } from '../errors';

const FIELD_ORDER = ['streamKey', 'videoUrl', 'quality', 'aspectRatio', 'token', 'repoName'] as const;

let validator: ValidateFunction<SetupConfig> | null = null;

function getValidator(): ValidateFunction<SetupConfig> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    validator = ajv.compile(SETUP_CONFIG_SCHEMA);
  }
  return validator;
}

function fieldOf(error: ErrorObject): string {
  if (error.instancePath) {
    return error.instancePath.replace(/^\//, '');
  }
  const missing: unknown = error.params['missingProperty'];
  return typeof missing === 'string' ? missing : 'root';
}

/**
 * @throws ConfigError naming the first offending field
 */
export function validateSetupConfig(data: unknown): SetupConfig {
  const validate = getValidator();
  if (validate(data)) {
    return data;
  }

  const errors = validate.errors ?? [];
  const first = errors[0];
  const field = first ? fieldOf(first) : 'root';
  const details = errors.map(e => `${fieldOf(e)} ${e.message ?? 'is invalid'}`).join('; ');
  throw new ConfigError(`Invalid setup config: ${details}`, field);
}

/**
 * @throws ConfigError unless `text` holds exactly six non-empty lines that validate
 */
export function parseSetupConfig(text: string): SetupConfig {
  const lines = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length !== FIELD_ORDER.length) {
    throw new ConfigError(
      `Setup file must have exactly ${FIELD_ORDER.length} non-empty lines ` +
      `(${FIELD_ORDER.join(', ')}), found ${lines.length}`,
    );
  }

  const record: Record<string, string> = {};
  FIELD_ORDER.forEach((field, index) => {
    record[field] = lines[index] ?? '';
  });
  return validateSetupConfig(record);
}

/**
 * Maps a config to the Actions secret slots the workflow reads.
 */
export function secretsFromConfig(config: SetupConfig): Record<SecretName, string> {
  return {
    YOUTUBE_STREAM_KEY: config.streamKey,
    VIDEO_URL: config.videoUrl,
    VIDEO_QUALITY: config.quality,
    ASPECT_RATIO: config.aspectRatio,
  };
}
