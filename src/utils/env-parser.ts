/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation. All env var access
 * outside the logger bootstrap goes through here.
 */

import {
  logConfigSchema,
  browserConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type BrowserEnvConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headed: env.SCOUT_HEADED,
    navigationTimeout: env.SCOUT_NAVIGATION_TIMEOUT,
    logsDir: env.SCOUT_LOGS_DIR,
  };
}

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate browser configuration from environment.
 */
export function parseBrowserConfig(env: Env = process.env): BrowserEnvConfig {
  const result = browserConfigSchema.safeParse(mapEnvToBrowserConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('browser', result.error);
  }
  return result.data;
}
