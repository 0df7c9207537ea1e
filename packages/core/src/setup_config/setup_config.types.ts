/**
 * The six inputs of a run, in the order the setup file lists them.
 */
export type SetupConfig = {
  streamKey: string;
  videoUrl: string;
  quality: string;
  aspectRatio: string;
  /** Bearer token; never logged */
  token: string;
  repoName: string;
};

/**
 * Where a run reads its SetupConfig from.
 */
export interface SetupConfigSource {
  /** @throws ConfigError when the source is missing or invalid */
  load(): Promise<SetupConfig>;
}

/**
 * Options for FsSetupConfigSource.
 */
export type FsSetupConfigSourceOptions = {
  /** Directory the file path is resolved against */
  cwd: string;
  /** Setup file path (default: 'setup_github.txt') */
  fileName?: string;
};
