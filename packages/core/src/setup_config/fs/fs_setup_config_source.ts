import * as fs from 'fs/promises';
import * as path from 'path';
import type { FsSetupConfigSourceOptions, SetupConfig, SetupConfigSource } from '../setup_config.types';
import { parseSetupConfig } from '../setup_config';
import { ConfigError } from '../../errors';
import { SETUP_FILE_NAME } from '../../constants';

/**
 * Reads the setup file from disk.
 */
export class FsSetupConfigSource implements SetupConfigSource {
  readonly filePath: string;

  constructor(options: FsSetupConfigSourceOptions) {
    this.filePath = path.resolve(options.cwd, options.fileName ?? SETUP_FILE_NAME);
  }

  async load(): Promise<SetupConfig> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      const reason = isErrnoException(error) && error.code === 'ENOENT'
        ? 'not found'
        : 'could not be read';
      throw new ConfigError(`Setup file ${this.filePath} ${reason}`, undefined, { cause: error });
    }
    return parseSetupConfig(text);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
