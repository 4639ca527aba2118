/**
 * Tests for the read-only scaffold check (engine/scaffold-validator.ts)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import pino from 'pino';
import { ScaffoldValidator, type ScaffoldExpectations } from '../engine/scaffold-validator.js';

let tmpDir: string;

const validator = new ScaffoldValidator(pino({ level: 'silent' }));

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scaffold-validator-test-'));
});

afterEach(() => {
  try {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors on Windows
  }
});

function createFile(relativePath: string, content: string): string {
  const absPath = path.join(tmpDir, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
  return absPath;
}

/** A project in the state a docs setup leaves it in */
function createPatchedProject(): void {
  createFile('Resources/OpenAPI/openapi.yml', 'openapi: 3.0.0\n');
  createFile('Resources/Views/redoc.leaf', '<redoc spec-url="#(specURL)"></redoc>\n');
  createFile(
    'Sources/App/routes.swift',
    [
      'import Vapor',
      '',
      'func routes(_ app: Application) throws {',
      '    app.get("openapi.yml") { req in "" }',
      '    app.get("docs") { req in "" }',
      '}',
      '',
    ].join('\n')
  );
  createFile(
    'Package.swift',
    [
      'let package = Package(',
      '    dependencies: [',
      '        .package(url: "https://github.com/vapor/leaf.git", from: "4.0.0"),',
      '    ]',
      ')',
      '',
    ].join('\n')
  );
}

const EXPECTATIONS: ScaffoldExpectations = {
  directories: ['Resources/OpenAPI', 'Resources/Views'],
  files: ['Resources/OpenAPI/openapi.yml', 'Resources/Views/redoc.leaf', 'Sources/App/routes.swift'],
  markers: [{ file: 'Sources/App/routes.swift', contains: ['app.get("openapi.yml")', 'app.get("docs")'] }],
  entries: [
    {
      file: 'Package.swift',
      block: 'dependencies: [',
      entries: ['.package(url: "https://github.com/vapor/leaf.git", from: "4.0.0"),'],
    },
  ],
  absent: ['Sources/App/Controllers/TodoController.swift'],
  absentMarkers: [{ file: 'Sources/App/routes.swift', contains: ['TodoController'] }],
};

describe('ScaffoldValidator.check', () => {
  it('returns no discrepancies for a fully patched project', () => {
    createPatchedProject();
    expect(validator.check(tmpDir, EXPECTATIONS)).toEqual([]);
  });

  it('reports exactly one discrepancy for one deleted file', () => {
    createPatchedProject();
    fs.rmSync(path.join(tmpDir, 'Sources/App/routes.swift'));

    expect(validator.check(tmpDir, EXPECTATIONS)).toEqual(['Missing file: Sources/App/routes.swift']);
  });

  it('reports a missing directory', () => {
    createPatchedProject();
    fs.rmSync(path.join(tmpDir, 'Resources/Views'), { recursive: true });

    expect(validator.check(tmpDir, { directories: ['Resources/Views'] })).toEqual([
      'Missing directory: Resources/Views',
    ]);
  });

  it('does not accept a file where a directory is expected', () => {
    createFile('Resources', 'not a directory');
    expect(validator.check(tmpDir, { directories: ['Resources'] })).toEqual(['Missing directory: Resources']);
  });

  it('reports each missing marker', () => {
    createFile('Sources/App/routes.swift', 'import Vapor\n');

    expect(validator.check(tmpDir, { markers: EXPECTATIONS.markers })).toEqual([
      'Marker "app.get("openapi.yml")" not found in: Sources/App/routes.swift',
      'Marker "app.get("docs")" not found in: Sources/App/routes.swift',
    ]);
  });

  it('reports a missing block and a missing entry', () => {
    createFile('Package.swift', 'let package = Package(\n    dependencies: [\n    ]\n)\n');

    expect(
      validator.check(tmpDir, {
        entries: [
          { file: 'Package.swift', block: 'exclude: [', entries: ['"Docs.docc",'] },
          { file: 'Package.swift', block: 'dependencies: [', entries: ['.package(url: "leaf"),'] },
        ],
      })
    ).toEqual([
      'Block "exclude: [" not found in: Package.swift',
      'Entry ".package(url: "leaf")," missing from block "dependencies: [" in: Package.swift',
    ]);
  });

  it('reports a block that is never closed', () => {
    createFile('Package.swift', 'let package = Package(\n    exclude: [\n        "Docs.docc",\n');

    expect(
      validator.check(tmpDir, {
        entries: [{ file: 'Package.swift', block: 'exclude: [', entries: ['"Docs.docc",'] }],
      })
    ).toEqual(['Block "exclude: [" is not closed in: Package.swift']);
  });

  it('reports paths and markers that should be gone', () => {
    createFile('Sources/App/Controllers/TodoController.swift', 'struct TodoController {}\n');
    createFile('Sources/App/routes.swift', 'try app.register(collection: TodoController())\n');

    expect(
      validator.check(tmpDir, { absent: EXPECTATIONS.absent, absentMarkers: EXPECTATIONS.absentMarkers })
    ).toEqual([
      'Unexpected path: Sources/App/Controllers/TodoController.swift',
      'Unexpected marker "TodoController" found in: Sources/App/routes.swift',
    ]);
  });

  it('does not report absent markers for a missing file', () => {
    expect(validator.check(tmpDir, { absentMarkers: EXPECTATIONS.absentMarkers })).toEqual([]);
  });

  it('lists discrepancies in expectation order', () => {
    expect(
      validator.check(tmpDir, {
        directories: ['Resources'],
        files: ['Package.swift'],
        markers: [{ file: 'Package.swift', contains: ['leaf'] }],
      })
    ).toEqual(['Missing directory: Resources', 'Missing file: Package.swift']);
  });

  it('changes nothing on disk', () => {
    createPatchedProject();
    const before = fs.readFileSync(path.join(tmpDir, 'Package.swift'), 'utf-8');
    validator.check(tmpDir, EXPECTATIONS);
    expect(fs.readFileSync(path.join(tmpDir, 'Package.swift'), 'utf-8')).toBe(before);
  });
});
