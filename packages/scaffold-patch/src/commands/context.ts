/**
 * Options and setup shared by every command
 */

import * as path from 'path';
import type { Command } from 'commander';
import type { Logger } from 'pino';
import { loadConfig, type Config } from '../config.js';
import { NotFoundError } from '../engine/errors.js';
import { createLogger } from '../logger.js';
import { resolvePlanPath } from '../plan/bundled.js';
import { loadPlan, type LoadedPlan } from '../plan/loader.js';

export interface CommonOptions {
  root?: string;
  verbose?: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--root <dir>', 'Project root (default: $SCAFFOLD_PATCH_ROOT or current directory)')
    .option('--verbose', 'Log engine activity to stderr');
}

/** Environment config, overridden by command-line flags */
export function resolveConfig(options: CommonOptions, env: Record<string, string | undefined> = process.env): Config {
  const config = loadConfig(env);
  return {
    ...config,
    root: path.resolve(options.root ?? config.root),
    logLevel: options.verbose ? 'debug' : config.logLevel,
  };
}

export function setup(options: CommonOptions): { config: Config; logger: Logger } {
  const config = resolveConfig(options);
  return { config, logger: createLogger(config.logLevel) };
}

/** Load a plan given as a file path or a bundled plan name */
export function loadPlanArg(planArg: string): LoadedPlan {
  const file = resolvePlanPath(planArg);
  if (!file) {
    throw new NotFoundError(planArg, 'file');
  }
  return loadPlan(file);
}

export function exitWithError(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}
