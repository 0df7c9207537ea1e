import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileArtifact } from '../../file_syncer';
import type { FsWorkloadSourceOptions, WorkloadCheck, WorkloadSource } from '../workload.types';
import { ConfigError } from '../../errors';
import { TRACKED_FILES } from '../../constants';

/**
 * Reads the tracked workload files from a workspace directory.
 * Paths use forward slashes and are resolved against `cwd`.
 */
export class FsWorkloadSource implements WorkloadSource {
  readonly trackedFiles: readonly string[];
  private readonly cwd: string;

  constructor(options: FsWorkloadSourceOptions) {
    this.cwd = options.cwd;
    this.trackedFiles = options.trackedFiles ?? TRACKED_FILES;
  }

  async check(): Promise<WorkloadCheck> {
    const found: string[] = [];
    const missing: string[] = [];

    for (const filePath of this.trackedFiles) {
      if (await this.isFile(filePath)) {
        found.push(filePath);
      } else {
        missing.push(filePath);
      }
    }

    return { found, missing };
  }

  async read(filePath: string): Promise<FileArtifact> {
    try {
      const content = await fs.readFile(this.resolve(filePath));
      return { path: filePath, content: new Uint8Array(content) };
    } catch (error: unknown) {
      throw new ConfigError(`Cannot read workload file ${filePath}`, filePath, { cause: error });
    }
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(filePath));
      return stats.isFile();
    } catch {
      return false;
    }
  }

  private resolve(filePath: string): string {
    return path.join(this.cwd, ...filePath.split('/'));
  }
}
