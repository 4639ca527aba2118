/**
 * Tests for the plans shipped with the package (plan/bundled.ts, plans/)
 *
 * Runs the Vapor plans end to end against a freshly generated project layout.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import pino from 'pino';
import { getPlansDir, listBundledPlans, resolvePlanPath } from '../plan/bundled.js';
import { loadPlan, resolveContent, type LoadedPlan } from '../plan/loader.js';
import { PlanRunner } from '../plan/runner.js';

// ── Test helpers ─────────────────────────────────────────────────────────────

let root: string;

const runner = new PlanRunner(pino({ level: 'silent' }));

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'scaffold-bundled-test-'));
});

afterEach(() => {
  try {
    fs.rmSync(root, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors on Windows
  }
});

function createFile(relativePath: string, content: string): void {
  const absPath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
}

function read(relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), 'utf-8');
}

/** Manifest whose resources block holds `entries` and whose exclude list is empty */
function resourcePackage(entries: string[]): string {
  return [
    'let package = Package(',
    '    targets: [',
    '        .executableTarget(',
    '            name: "App",',
    '            exclude: [],',
    '            resources: [',
    ...entries.map((entry) => '                ' + entry),
    '            ]',
    '        ),',
    '    ]',
    ')',
    '',
  ].join('\n');
}

const FIXED_PACKAGE = [
  'let package = Package(',
  '    targets: [',
  '        .executableTarget(',
  '            name: "App",',
  '            exclude: [',
  '                ".build/checkouts/leaf-kit/Sources/LeafKit/Docs.docc",',
  '                ".build/checkouts/swift-algorithms/Sources/Algorithms/Documentation.docc",',
  '            ],',
  '            resources: [',
  '                .process("Sources/App/Resources/Views"),',
  '                .process("Sources/App/Resources/openapi.yml"),',
  '            ]',
  '        ),',
  '    ]',
  ')',
  '',
].join('\n');

function bundled(name: string): LoadedPlan {
  const file = resolvePlanPath(name);
  if (!file) {
    throw new Error(`bundled plan not found: ${name}`);
  }
  return loadPlan(file);
}

const PACKAGE = [
  '// swift-tools-version:5.9',
  'import PackageDescription',
  '',
  'let package = Package(',
  '    name: "App",',
  '    platforms: [',
  '        .macOS(.v13)',
  '    ],',
  '    dependencies: [',
  '        .package(url: "https://github.com/vapor/vapor.git", from: "4.89.0"),',
  '        .package(url: "https://github.com/vapor/fluent.git", from: "4.8.0"),',
  '    ],',
  '    targets: [',
  '        .executableTarget(',
  '            name: "App",',
  '            dependencies: [',
  '                .product(name: "Fluent", package: "fluent"),',
  '                .product(name: "Vapor", package: "vapor"),',
  '            ]',
  '        ),',
  '    ]',
  ')',
  '',
].join('\n');

const ROUTES = [
  'import Fluent',
  'import Vapor',
  '',
  'func routes(_ app: Application) throws {',
  '    app.get { req async in',
  '        "It works!"',
  '    }',
  '',
  '    try app.register(collection: TodoController())',
  '}',
  '',
].join('\n');

const CONFIGURE = [
  'import Fluent',
  'import Vapor',
  '',
  '// configures your application',
  'public func configure(_ app: Application) async throws {',
  '    app.migrations.add(CreateTodo())',
  '',
  '    // register routes',
  '    try routes(app)',
  '}',
  '',
].join('\n');

function createVaporProject(): void {
  createFile('Package.swift', PACKAGE);
  createFile('Sources/App/routes.swift', ROUTES);
  createFile('Sources/App/configure.swift', CONFIGURE);
  createFile('Sources/App/Controllers/TodoController.swift', 'struct TodoController: RouteCollection {}\n');
  createFile('Sources/App/Migrations/CreateTodo.swift', 'struct CreateTodo: AsyncMigration {}\n');
  createFile('Sources/App/Models/Todo.swift', 'final class Todo: Model {}\n');
}

// ── Catalogue ────────────────────────────────────────────────────────────────

describe('bundled plans', () => {
  it('are found next to the sources', () => {
    expect(getPlansDir()).not.toBeNull();
  });

  it('are listed by name without templates', () => {
    expect(listBundledPlans()).toEqual([
      'tidy',
      'vapor/clean',
      'vapor/fix-resource-conflicts',
      'vapor/fix-resources',
      'vapor/fix-root-resources',
      'vapor/rollback-openapi',
      'vapor/setup-openapi',
      'vapor/validate-openapi',
    ]);
  });

  it('all parse and resolve their templates', () => {
    for (const name of listBundledPlans()) {
      const { plan, baseDir } = bundled(name);
      const sources = [
        ...plan.create,
        ...plan.files.flatMap((edit) => [...edit.insert, ...edit.retract]),
      ];
      for (const source of sources) {
        expect(() => resolveContent(source, baseDir)).not.toThrow();
      }
    }
  });

  it('resolves names with or without an extension', () => {
    expect(resolvePlanPath('vapor/clean')).toBe(resolvePlanPath('vapor/clean.yaml'));
    expect(resolvePlanPath('vapor/missing')).toBeNull();
  });
});

// ── End to end ───────────────────────────────────────────────────────────────

describe('vapor plans', () => {
  it('clean removes the Todo example', () => {
    createVaporProject();

    const report = runner.run(bundled('vapor/clean'), { root });

    expect(report.ok).toBe(true);
    expect(fs.existsSync(path.join(root, 'Sources/App/Controllers/TodoController.swift'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'Sources/App/Migrations/CreateTodo.swift'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'Sources/App/Models/Todo.swift'))).toBe(true);
    expect(read('Sources/App/routes.swift')).not.toContain('TodoController');
    expect(read('Sources/App/configure.swift')).not.toContain('CreateTodo');
  });

  it('setup-openapi leaves a project that validate-openapi accepts', () => {
    createVaporProject();

    const report = runner.run(bundled('vapor/setup-openapi'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.at(-1)?.action).toBe('unchanged');
    expect(runner.validate(bundled('vapor/validate-openapi'), root)).toEqual([]);
    expect(read('Sources/App/configure.swift').split('\n').slice(0, 3)).toEqual([
      'import Fluent',
      'import Vapor',
      'import Leaf',
    ]);
  });

  it('setup-openapi is idempotent', () => {
    createVaporProject();
    runner.run(bundled('vapor/setup-openapi'), { root });
    const files = ['Package.swift', 'Sources/App/routes.swift', 'Sources/App/configure.swift'].map(read);

    const second = runner.run(bundled('vapor/setup-openapi'), { root });

    expect(second.steps.every((s) => s.action === 'unchanged')).toBe(true);
    expect(['Package.swift', 'Sources/App/routes.swift', 'Sources/App/configure.swift'].map(read)).toEqual(files);
  });

  it('rollback-openapi restores the generated sources', () => {
    createVaporProject();
    runner.run(bundled('vapor/setup-openapi'), { root });

    const report = runner.run(bundled('vapor/rollback-openapi'), { root });

    expect(report.ok).toBe(true);
    expect(read('Package.swift')).toBe(PACKAGE);
    expect(read('Sources/App/routes.swift')).toBe(ROUTES);
    expect(read('Sources/App/configure.swift')).toBe(CONFIGURE);
    expect(fs.existsSync(path.join(root, 'Resources/OpenAPI'))).toBe(false);
  });

  it('fix-resources moves nested resources and repairs the manifest', () => {
    createFile(
      'Package.swift',
      [
        'let package = Package(',
        '    targets: [',
        '        .executableTarget(',
        '            name: "App",',
        '            exclude: [],',
        '            resources: [',
        '                .process("Sources/App/Sources/App/Resources/Views"),',
        '            ]',
        '        ),',
        '    ]',
        ')',
        '',
      ].join('\n')
    );
    createFile('Sources/App/Resources/Sources/App/Resources/Views/index.leaf', '<h1>index</h1>\n');

    const report = runner.run(bundled('vapor/fix-resources'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.map((s) => s.action)).toEqual(['merged', 'unchanged', 'edited', 'unchanged']);
    expect(read('Sources/App/Resources/Views/index.leaf')).toBe('<h1>index</h1>\n');
    expect(fs.existsSync(path.join(root, 'Sources/App/Resources/Sources'))).toBe(false);
    expect(read('Package.swift').split('\n').slice(4, 12)).toEqual([
      '            exclude: [',
      '                ".build/checkouts/leaf-kit/Sources/LeafKit/Docs.docc",',
      '                ".build/checkouts/swift-algorithms/Sources/Algorithms/Documentation.docc",',
      '            ],',
      '            resources: [',
      '                .process("Sources/App/Resources/Views"),',
      '                .process("Sources/App/Resources/openapi.yml"),',
      '            ]',
    ]);

    const second = runner.run(bundled('vapor/fix-resources'), { root });
    expect(second.steps.map((s) => s.action)).toEqual(['unchanged', 'unchanged', 'unchanged', 'unchanged']);
  });

  it('fix-resources creates the Views directory the manifest declares', () => {
    createFile('Package.swift', resourcePackage([]));

    const report = runner.run(bundled('vapor/fix-resources'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.map((s) => [s.step, s.action])).toEqual([
      ['merge', 'unchanged'],
      ['ensure-dir', 'created'],
      ['edit', 'edited'],
      ['validate', 'unchanged'],
    ]);
    expect(fs.statSync(path.join(root, 'Sources/App/Resources/Views')).isDirectory()).toBe(true);
    expect(fs.readdirSync(path.join(root, 'Sources/App/Resources/Views'))).toEqual([]);
  });

  it('fix-root-resources moves root Views and openapi.yml under Sources/App', () => {
    createFile('Package.swift', resourcePackage(['.process("Resources/Views"),', '.process("Resources/openapi.yml"),']));
    createFile('Resources/Views/index.leaf', '<h1>index</h1>\n');
    createFile('Resources/openapi.yml', 'openapi: 3.0.0\n');

    const report = runner.run(bundled('vapor/fix-root-resources'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.map((s) => [s.step, s.action])).toEqual([
      ['merge', 'merged'],
      ['ensure-dir', 'unchanged'],
      ['edit', 'edited'],
      ['validate', 'unchanged'],
    ]);
    expect(report.steps[0].details).toEqual(['Views/index.leaf', 'openapi.yml']);
    expect(read('Sources/App/Resources/Views/index.leaf')).toBe('<h1>index</h1>\n');
    expect(read('Sources/App/Resources/openapi.yml')).toBe('openapi: 3.0.0\n');
    expect(fs.existsSync(path.join(root, 'Resources'))).toBe(false);
    expect(read('Package.swift')).toBe(FIXED_PACKAGE);

    const second = runner.run(bundled('vapor/fix-root-resources'), { root });
    expect(second.steps.map((s) => s.action)).toEqual(['unchanged', 'unchanged', 'unchanged', 'unchanged']);
    expect(read('Package.swift')).toBe(FIXED_PACKAGE);
  });

  it('fix-resource-conflicts moves Sources/App/Sources/App/Resources and prunes the empty tree', () => {
    createFile('Package.swift', resourcePackage(['.process("Sources/App/Sources/App/Resources/Views"),']));
    createFile('Sources/App/Sources/App/Resources/Views/index.leaf', '<h1>index</h1>\n');
    createFile('Sources/App/routes.swift', 'import Vapor\n');

    const report = runner.run(bundled('vapor/fix-resource-conflicts'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.map((s) => [s.step, s.action])).toEqual([
      ['merge', 'merged'],
      ['ensure-dir', 'unchanged'],
      ['edit', 'edited'],
      ['validate', 'unchanged'],
    ]);
    expect(read('Sources/App/Resources/Views/index.leaf')).toBe('<h1>index</h1>\n');
    expect(fs.existsSync(path.join(root, 'Sources/App/Sources'))).toBe(false);
    expect(read('Sources/App/routes.swift')).toBe('import Vapor\n');
    expect(read('Package.swift')).toBe(FIXED_PACKAGE);

    const second = runner.run(bundled('vapor/fix-resource-conflicts'), { root });
    expect(second.steps.map((s) => s.action)).toEqual(['unchanged', 'unchanged', 'unchanged', 'unchanged']);
  });

  it('tidy purges .DS_Store files and ignores them', () => {
    createFile('.DS_Store', '');
    createFile('Sources/App/.DS_Store', '');

    const report = runner.run(bundled('tidy'), { root });

    expect(report.ok).toBe(true);
    expect(report.steps.map((s) => [s.step, s.action])).toEqual([
      ['purge', 'removed'],
      ['gitignore', 'edited'],
      ['validate', 'unchanged'],
    ]);
    expect(read('.gitignore')).toBe('.DS_Store\n');
  });
});
