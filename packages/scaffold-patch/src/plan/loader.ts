import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { NotFoundError, errorCode, toIOFailure } from '../engine/errors.js';
import { MigrationPlanSchema, type ContentSpec, type MigrationPlan } from './schema.js';

export interface LoadedPlan {
  plan: MigrationPlan;
  /** Absolute path of the plan file */
  file: string;
  /** Directory templates resolve against */
  baseDir: string;
}

/** Thrown when a plan file is not valid YAML or does not match the schema */
export class PlanValidationError extends Error {
  readonly file: string;
  readonly problems: string[];

  constructor(file: string, problems: string[]) {
    super(`Invalid plan ${file}:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'PlanValidationError';
    this.file = file;
    this.problems = problems;
  }
}

/**
 * Parse and validate plan text. `file` is used for messages and as the base
 * for template paths.
 */
export function parsePlan(text: string, file: string): LoadedPlan {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanValidationError(file, [`YAML parse error: ${reason}`]);
  }

  const parsed = MigrationPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PlanValidationError(file, parsed.error.issues.map(formatIssue));
  }

  const absolute = path.resolve(file);
  return { plan: parsed.data, file: absolute, baseDir: path.dirname(absolute) };
}

export function loadPlan(file: string): LoadedPlan {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError(file, 'file');
    }
    throw toIOFailure(error, file, 'read');
  }
  return parsePlan(text, file);
}

/** Resolve the text of a content block: inline content, or its template file */
export function resolveContent(source: ContentSpec, baseDir: string): string {
  if (source.content !== undefined) {
    return source.content;
  }
  const templatePath = path.resolve(baseDir, source.template ?? '');
  try {
    return fs.readFileSync(templatePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError(templatePath, 'file');
    }
    throw toIOFailure(error, templatePath, 'read');
  }
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
