/**
 * Plans shipped with the package, addressed by name (`vapor/clean`).
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const PLAN_EXTENSIONS = ['.yaml', '.yml'];

/**
 * Locate the bundled plans directory. Sources run from src/plan/, a build
 * runs from a dist/ tree one or more levels deeper.
 */
export function getPlansDir(): string | null {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'plans'),
    path.resolve(__dirname, '..', '..', '..', 'plans'),
    path.resolve(__dirname, '..', '..', '..', '..', '..', 'plans'),
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
  }
  return null;
}

/** Names of all bundled plans, sorted, without extension */
export function listBundledPlans(plansDir: string | null = getPlansDir()): string[] {
  if (!plansDir) {
    return [];
  }
  const names: string[] = [];
  const visit = (dir: string, prefix: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      // Template directories sit next to the plans that use them
      if (entry.isDirectory() && entry.name !== 'templates') {
        visit(path.join(dir, entry.name), `${prefix}${entry.name}/`);
      } else if (entry.isFile() && PLAN_EXTENSIONS.includes(path.extname(entry.name))) {
        names.push(prefix + path.basename(entry.name, path.extname(entry.name)));
      }
    }
  };
  visit(plansDir, '');
  return names.sort();
}

/**
 * Resolve a plan argument: an existing file path wins, then a bundled plan
 * name. Returns null when neither matches.
 */
export function resolvePlanPath(nameOrPath: string, plansDir: string | null = getPlansDir()): string | null {
  if (fs.existsSync(nameOrPath) && fs.statSync(nameOrPath).isFile()) {
    return path.resolve(nameOrPath);
  }
  if (!plansDir) {
    return null;
  }
  for (const ext of ['', ...PLAN_EXTENSIONS]) {
    const candidate = path.join(plansDir, nameOrPath + ext);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}
