import { DEFAULT_STATE_FILE } from './utils/state.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface Config {
  /** Project root every plan path resolves against */
  root: string;
  logLevel: LogLevel;
  /** State file name, relative to the root */
  stateFile: string;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function parseLogLevel(value: string, fallback: LogLevel): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value.toLowerCase());
  return match ?? fallback;
}

/**
 * Build the configuration from environment variables:
 * - SCAFFOLD_PATCH_ROOT       project root (default: current directory)
 * - SCAFFOLD_PATCH_LOG_LEVEL  pino level (default: warn)
 * - SCAFFOLD_PATCH_STATE_FILE merge journal file (default: .scaffold-patch-state.json)
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): Config {
  return {
    root: getEnv(env, 'SCAFFOLD_PATCH_ROOT', cwd),
    logLevel: parseLogLevel(getEnv(env, 'SCAFFOLD_PATCH_LOG_LEVEL', 'warn'), 'warn'),
    stateFile: getEnv(env, 'SCAFFOLD_PATCH_STATE_FILE', DEFAULT_STATE_FILE),
  };
}
