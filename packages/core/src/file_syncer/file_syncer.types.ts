import type { Logger } from '../logger';

/**
 * A local file to be mirrored into the repository
 */
export type FileArtifact = {
  /** Path relative to the repository root */
  path: string;
  content: Uint8Array;
  /** Marker of the remote content being replaced, set by the probe */
  revisionMarker?: string;
};

/**
 * Outcome of one upload
 */
export type FileUploadRecord = {
  path: string;
  success: boolean;
  /** Status of the write */
  status: number;
  /** Marker that was sent with the write, if the path already had content */
  revisionMarker?: string;
  /** Response body of a failed write, for diagnostics */
  responseBody?: unknown;
};

export type FileSyncerOptions = {
  /** Target branch (default: 'main') */
  branch?: string;
  /** Commit message builder (default: `Upload <path>`) */
  commitMessage?: (path: string) => string;
  logger?: Logger;
};
