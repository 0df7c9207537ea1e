import type { FileArtifact } from '../file_syncer';

/**
 * Presence of the tracked files in the workspace.
 */
export type WorkloadCheck = {
  found: string[];
  missing: string[];
};

/**
 * Local files mirrored into the repository by a run.
 */
export interface WorkloadSource {
  /** Tracked paths, relative to the workspace and to the repository root */
  readonly trackedFiles: readonly string[];
  check(): Promise<WorkloadCheck>;
  /** @throws ConfigError when the file cannot be read */
  read(filePath: string): Promise<FileArtifact>;
}

export type FsWorkloadSourceOptions = {
  /** Workspace directory */
  cwd: string;
  /** Default: TRACKED_FILES */
  trackedFiles?: readonly string[];
};
