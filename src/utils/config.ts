import dotenv from 'dotenv';
import type { LevelWithSilent } from 'pino';

export interface SortedMapConfig {
  logLevel: LevelWithSilent;   // Level for loggers built by createLogger()
  prettyLogs: boolean;         // Route logs through pino-pretty (development only)
  verifyInvariants: boolean;   // Validate the whole tree after every mutation
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Accepts 1, true, yes and on, case-insensitively
 */
export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Builds the configuration from an environment map
 * HIDE_LOGS or NODE_ENV=production force 'warn'; otherwise LOG_LEVEL, falling back to 'debug'
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SortedMapConfig {
  const hideLogs = Boolean(env['HIDE_LOGS']);
  const production = env['NODE_ENV'] === 'production';
  const requested = env['LOG_LEVEL']?.trim().toLowerCase();

  let logLevel: LevelWithSilent = 'debug';
  if (hideLogs || production) {
    logLevel = 'warn';
  } else if (requested) {
    if (!isLogLevel(requested)) {
      throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${requested}"`);
    }
    logLevel = requested;
  }

  return {
    logLevel,
    prettyLogs: env['NODE_ENV'] === 'development' && !hideLogs,
    verifyInvariants: isTruthy(env['SORTED_MAP_VERIFY'])
  };
}

let cached: SortedMapConfig | null = null;

/**
 * Process-wide configuration, read once from .env and process.env
 */
export function getConfig(): SortedMapConfig {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
  }
  return cached;
}

/**
 * Drops the cached configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  cached = null;
}
