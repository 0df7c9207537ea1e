/**
 * Command option interfaces for the streamhost CLI
 */

import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Options shared by commands that read the local workspace
 */
export interface WorkspaceCommandOptions extends BaseCommandOptions {
  /** Workspace directory (default: current directory) */
  dir?: string;
  /** Setup file, relative to the workspace */
  config?: string;
}

/**
 * Options of `streamhost setup`. Numeric flags arrive as strings.
 */
export interface SetupCommandOptions extends WorkspaceCommandOptions {
  apiUrl?: string;
  timeout?: string;
  settle?: string;
}

export type CheckCommandOptions = WorkspaceCommandOptions;
