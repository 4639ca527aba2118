import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const PACKAGE_NAME = 'scaffold-patch';

/**
 * Version from this package's package.json. Sources sit one directory below
 * it, a dist/ build deeper; walk up until the right manifest turns up.
 */
export function readPackageVersion(startDir: string = __dirname): string {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (isPackageJson(pkg) && pkg.name === PACKAGE_NAME) {
        return pkg.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break; // Reached filesystem root
    dir = parent;
  }
  return '0.0.0';
}

function isPackageJson(value: unknown): value is { name: string; version: string } {
  return typeof value === 'object'
    && value !== null
    && 'name' in value
    && 'version' in value
    && typeof value.name === 'string'
    && typeof value.version === 'string';
}
