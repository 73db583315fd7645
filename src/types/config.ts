/**
 * Configuration types for a single stacksmith run.
 */

/** Flags read once from the command line; immutable for the run. */
export interface RunOptions {
  /** Log intended actions without writing files or spawning processes. */
  dryRun: boolean;
  /** Print detailed step logs. */
  verbose: boolean;
  /** Overwrite configuration files without keeping `.bak` backups. */
  force: boolean;
}

/** Absolute paths of every artifact stacksmith reads or writes. */
export interface ProjectPaths {
  root: string;
  pyproject: string;
  preCommitConfig: string;
  githubDir: string;
  dependabotConfig: string;
  securityPolicy: string;
  gitHooksDir: string;
}

/** Detected platform. */
export type Platform = 'linux' | 'macos' | 'windows' | 'unknown';

/** Host capabilities, resolved once at startup. */
export interface PlatformCapabilities {
  platform: Platform;
  /** Whether the uvloop event loop can be installed on this host. */
  asyncEventLoop: boolean;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Tool configuration resolved from defaults and environment. */
export interface StackConfig {
  packageManager: {
    /** Executable invoked for init/add/run. */
    command: string;
    /** Display name used in progress and error messages. */
    displayName: string;
    /** Installer suggested when the package manager is missing. */
    installer: string;
    docsUrl: string;
  };
  logging: {
    level: LogLevel;
  };
}
