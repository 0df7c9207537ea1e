import type { FileArtifact } from '../../file_syncer';
import type { WorkloadCheck, WorkloadSource } from '../workload.types';
import { ConfigError } from '../../errors';
import { TRACKED_FILES } from '../../constants';

/**
 * In-memory WorkloadSource for tests.
 */
export class MemoryWorkloadSource implements WorkloadSource {
  readonly trackedFiles: readonly string[];
  private readonly files: Map<string, Uint8Array>;

  constructor(files: Record<string, string>, trackedFiles: readonly string[] = TRACKED_FILES) {
    this.trackedFiles = trackedFiles;
    this.files = new Map(Object.entries(files).map(([filePath, text]) => [filePath, Buffer.from(text, 'utf-8')]));
  }

  async check(): Promise<WorkloadCheck> {
    return {
      found: this.trackedFiles.filter(f => this.files.has(f)),
      missing: this.trackedFiles.filter(f => !this.files.has(f)),
    };
  }

  async read(filePath: string): Promise<FileArtifact> {
    const content = this.files.get(filePath);
    if (!content) {
      throw new ConfigError(`Cannot read workload file ${filePath}`, filePath);
    }
    return { path: filePath, content };
  }
}
