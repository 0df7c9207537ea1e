import * as path from 'path';
import {
  DEFAULT_API_BASE_URL,
  FileSyncer,
  FsSetupConfigSource,
  FsWorkloadSource,
  GitHubRemoteClient,
  IdentityVerifier,
  RepositoryProvisioner,
  SecretProvisioner,
  SetupOrchestrator,
  createLogger,
} from '@streamhost/core';
import type { LogLevel, RunState, SetupState } from '@streamhost/core';

/**
 * Settings the CLI collects from flags and the environment
 */
export interface OrchestratorSettings {
  /** Workspace directory; relative paths resolve against process.cwd() */
  cwd?: string;
  /** Setup file name, relative to the workspace */
  configFile?: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  settleDelayMs?: number;
  logLevel?: LogLevel;
  onTransition?: (from: SetupState, to: RunState) => void;
}

/**
 * Dependency Injection Service for the streamhost CLI
 *
 * Wires the core components into a SetupOrchestrator for the current
 * workspace and flags.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resolves the API base URL: explicit flag, then STREAMHOST_API_URL, then the default
   */
  resolveApiBaseUrl(flag?: string): string {
    return flag || process.env['STREAMHOST_API_URL'] || DEFAULT_API_BASE_URL;
  }

  resolveWorkspace(dir?: string): string {
    return path.resolve(process.cwd(), dir ?? '.');
  }

  getSetupOrchestrator(settings: OrchestratorSettings = {}): SetupOrchestrator {
    const cwd = this.resolveWorkspace(settings.cwd);
    const apiBaseUrl = this.resolveApiBaseUrl(settings.apiBaseUrl);
    const level = settings.logLevel;

    return new SetupOrchestrator({
      workload: new FsWorkloadSource({ cwd }),
      configSource: new FsSetupConfigSource({ cwd, fileName: settings.configFile }),
      createClient: (token: string) => new GitHubRemoteClient({
        token,
        apiBaseUrl,
        timeoutMs: settings.timeoutMs,
        logger: createLogger('[RemoteClient] ', level),
      }),
      identityVerifier: new IdentityVerifier({ logger: createLogger('[IdentityVerifier] ', level) }),
      repositoryProvisioner: new RepositoryProvisioner({
        settleDelayMs: settings.settleDelayMs,
        logger: createLogger('[RepositoryProvisioner] ', level),
      }),
      fileSyncer: new FileSyncer({ logger: createLogger('[FileSyncer] ', level) }),
      secretProvisioner: new SecretProvisioner({ logger: createLogger('[SecretProvisioner] ', level) }),
      onTransition: settings.onTransition,
      logger: createLogger('[SetupOrchestrator] ', level),
    });
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }
}
