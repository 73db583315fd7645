/**
 * Configuration loader for stacksmith.
 *
 * Resolution priority: CLI flags > Environment vars > Defaults
 */

import type { LogLevel, StackConfig } from '../types/config.js';

/** Default configuration values. */
const DEFAULTS: StackConfig = {
  packageManager: {
    command: 'poetry',
    displayName: 'Poetry',
    installer: 'pipx',
    docsUrl: 'https://python-poetry.org/docs/#installation',
  },
  logging: {
    level: 'warn',
  },
};

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Environment variables and the config field each one overrides. */
const ENV_OVERRIDES: Record<string, (config: StackConfig, value: string) => void> = {
  STACKSMITH_POETRY: (config, value) => {
    config.packageManager.command = value;
  },
  STACKSMITH_LOG_LEVEL: (config, value) => {
    const level = value.toLowerCase();
    if (isLogLevel(level)) config.logging.level = level;
  },
};

/**
 * Load configuration from defaults and environment variables.
 * Empty values are ignored; an unknown log level keeps the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StackConfig {
  const config: StackConfig = {
    packageManager: { ...DEFAULTS.packageManager },
    logging: { ...DEFAULTS.logging },
  };

  for (const [envKey, apply] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envKey]?.trim();
    if (value) {
      apply(config, value);
    }
  }

  return config;
}

