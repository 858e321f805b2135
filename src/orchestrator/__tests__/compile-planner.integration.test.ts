/**
 * compile-planner.integration.test.ts
 *
 * Integration tests for CompilePlanner using the in-repo fixture at
 * tests/fixtures/modular-app/, plus small projects built in temporary
 * directories for the edge cases.
 *
 * Fixture structure:
 *   src/test/java     test sources of org.example.app, with module-info-patch.txt
 *   src/test/java17   release-17 test sources of org.example.app
 *   src/it/java       sources of module org.example.it (no patch file)
 *   target/classes    main output directory
 *   plan.json         test-scope configuration; also lists a missing root
 *
 * These tests verify:
 *   1. Patch file and implicit patch expand TEST-MODULE-PATH as expected
 *   2. Module options contain --add-modules exactly once
 *   3. Module path and class path follow dependency scopes
 *   4. One unit per release, ascending, with the right unit options
 *   5. Argument files and compile-plan.json are written and deterministic
 *   6. A module-info.java among the test sources disables patching
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CompilePlanner, PLAN_FILE_NAME } from '../compile-planner.js';
import { loadPlannerConfig } from '../../services/config-loader.js';
import { FileLogger } from '../../services/logger.js';
import { PlanExporter } from '../../services/plan-exporter.js';
import { PatchSyntaxError } from '../../parsers/patch/patch-syntax-error.js';
import type { CompilePlan } from '../../models/compile-plan.js';
import type { PlannerConfig } from '../../models/planner-config.js';

// ---------------------------------------------------------------------------
// Fixture paths
// ---------------------------------------------------------------------------

const FIXTURE_ROOT = path.resolve('tests/fixtures/modular-app');
const fx = (...segments: string[]): string => path.join(FIXTURE_ROOT, ...segments);
const joined = (...entries: string[]): string => entries.join(path.delimiter);

function fixtureConfig(): PlannerConfig {
  return loadPlannerConfig(fx('plan.json'));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'compile-planner-int-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function touch(relPath: string, content = ''): void {
  const full = path.join(tmpDir, relPath);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf-8');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CompilePlanner (modular-app fixture)', () => {
  let plan: CompilePlan;

  beforeEach(() => {
    plan = new CompilePlanner(fixtureConfig()).run();
  });

  it('plans a modular test compilation', () => {
    expect(plan.scope).toBe('test');
    expect(plan.mode).toBe('compile');
    expect(plan.modular).toBe(true);
    expect(plan.stats).toEqual({
      sourceRoots: 3,
      sourceFiles: 4,
      units: 2,
      modulePatches: 2,
      patchFiles: 1,
    });
  });

  it('writes module options of the loaded and the implicit patch', () => {
    expect(plan.moduleOptions).toEqual([
      { name: '--add-modules', value: 'org.junit.api' },
      { name: '--add-reads', value: 'org.example.app=org.example.api' },
      {
        name: '--add-exports',
        value: 'org.example.app/org.example.app.util=org.junit.api,org.opentest4j',
      },
      { name: '--add-opens', value: 'org.example.app/org.example.app=org.junit.api' },
      { name: '--add-reads', value: 'org.example.it=org.junit.api,ALL-UNNAMED' },
    ]);
  });

  it('puts main classes and named modules on the module path', () => {
    expect(plan.pathOptions).toEqual([
      {
        name: '--module-path',
        value: joined(fx('target/classes'), fx('lib/api.jar'), fx('lib/junit-api.jar'), fx('lib/opentest4j.jar')),
      },
      { name: '--class-path', value: fx('lib/helpers.jar') },
    ]);
  });

  it('builds one unit per release in ascending order', () => {
    expect(plan.units.map((u) => u.release)).toEqual([0, 17]);

    const [base, java17] = plan.units;
    expect(base?.files).toEqual([
      fx('src/test/java/org/example/app/AppTest.java'),
      fx('src/test/java/org/example/app/util/HelperTest.java'),
      fx('src/it/java/org/example/it/ItTest.java'),
    ]);
    expect(base?.roots).toEqual({ '': [fx('src/test/java')], 'org.example.it': [fx('src/it/java')] });
    expect(base?.outputDirectories).toEqual([fx('target/test-classes'), fx('target/test-classes/org.example.it')]);
    expect(base?.options).toEqual([
      { name: '--release', value: '11' },
      { name: '--patch-module', value: `org.example.app=${fx('src/test/java')}` },
      { name: '--patch-module', value: `org.example.it=${fx('src/it/java')}` },
    ]);

    expect(java17?.files).toEqual([fx('src/test/java17/org/example/app/RecordTest.java')]);
    expect(java17?.options).toEqual([
      { name: '--release', value: '17' },
      { name: '-d', value: fx('target/test-classes/META-INF/versions/17') },
      { name: '--patch-module', value: `org.example.app=${fx('src/test/java17')}` },
    ]);
  });

  it('adds runtime-only test modules when planning execution', () => {
    const runtime = new CompilePlanner({ ...fixtureConfig(), mode: 'runtime' }).run();
    expect(runtime.moduleOptions[0]).toEqual({ name: '--add-modules', value: 'org.junit.api,org.junit.engine' });
    expect(runtime.moduleOptions).toContainEqual({
      name: '--add-reads',
      value: 'org.example.it=org.junit.api,org.junit.engine,ALL-UNNAMED',
    });
  });

  describe('Output writing', () => {
    it('writes one argument file per unit and the plan JSON', () => {
      const outDir = path.join(tmpDir, 'plan');
      new CompilePlanner(fixtureConfig(), { outputDir: outDir }).run();

      expect(fs.readdirSync(outDir).sort()).toEqual(['compile-plan.json', 'javac-test-17.args', 'javac-test.args']);

      const lines = fs.readFileSync(path.join(outDir, 'javac-test-17.args'), 'utf-8').split('\n');
      expect(lines.slice(0, 2)).toEqual(['--add-modules', 'org.junit.api']);
      expect(lines.slice(-2)).toEqual([
        PlanExporter.quote(fx('src/test/java17/org/example/app/RecordTest.java')),
        '',
      ]);
    });

    it('honours a configured argument file name', () => {
      const outDir = path.join(tmpDir, 'plan');
      new CompilePlanner({ ...fixtureConfig(), debugFileName: 'test.args' }, { outputDir: outDir }).run();
      expect(fs.existsSync(path.join(outDir, 'test.args'))).toBe(true);
      expect(fs.existsSync(path.join(outDir, 'test-17.args'))).toBe(true);
    });

    it('produces byte-identical plan JSON across runs', () => {
      const first = path.join(tmpDir, 'first');
      const second = path.join(tmpDir, 'second');
      new CompilePlanner(fixtureConfig(), { outputDir: first }).run();
      new CompilePlanner(fixtureConfig(), { outputDir: second }).run();

      expect(fs.readFileSync(path.join(first, PLAN_FILE_NAME), 'utf-8')).toBe(
        fs.readFileSync(path.join(second, PLAN_FILE_NAME), 'utf-8'),
      );
    });
  });
});

describe('CompilePlanner (temporary projects)', () => {
  it('plans a non-modular main compilation with a release-specific root', () => {
    touch('src/main/java/org/example/A.java');
    touch('src/main/java9/org/example/B.java');
    const out = path.join(tmpDir, 'out');

    const plan = new CompilePlanner({
      projectRoot: tmpDir,
      outputDirectory: out,
      sourceRoots: [{ path: 'src/main/java' }, { path: 'src/main/java9', release: 9 }],
    }).run();

    expect(plan.scope).toBe('main');
    expect(plan.modular).toBe(false);
    expect(plan.moduleOptions).toEqual([]);
    expect(plan.pathOptions).toEqual([]);
    expect(plan.units.map((u) => u.options)).toEqual([
      [{ name: '-d', value: out }],
      [
        { name: '--release', value: '9' },
        { name: '-d', value: path.join(out, 'META-INF', 'versions', '9') },
      ],
    ]);
  });

  it('warns and skips patching when the test sources declare a module', () => {
    touch('src/test/java/module-info.java', 'open module app {}');
    touch('src/test/java/app/FooTest.java');
    touch('src/test/java/module-info-patch.txt', 'patch-module app { add-reads X; }');
    const logger = new FileLogger('warn');

    const plan = new CompilePlanner(
      {
        projectRoot: tmpDir,
        scope: 'test',
        outputDirectory: path.join(tmpDir, 'out'),
        mainModuleName: 'app',
        sourceRoots: [{ path: 'src/test/java' }],
        dependencies: [{ id: 'junit', scope: 'test', path: path.join(tmpDir, 'junit.jar'), module: { name: 'junit' } }],
      },
      { logger },
    ).run();

    expect(plan.modular).toBe(true);
    expect(plan.moduleOptions).toEqual([]);
    expect(plan.pathOptions).toEqual([{ name: '--module-path', value: path.join(tmpDir, 'junit.jar') }]);
    expect(plan.units[0]?.options).toEqual([{ name: '-d', value: path.join(tmpDir, 'out') }]);
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0]).toContain('[WARN ] The test sources contain a module-info.java file');
  });

  it('applies the implicit patch when no patch file exists', () => {
    touch('src/test/java/app/FooTest.java');

    const plan = new CompilePlanner({
      projectRoot: tmpDir,
      scope: 'test',
      outputDirectory: path.join(tmpDir, 'out'),
      mainModuleName: 'app',
      sourceRoots: [{ path: 'src/test/java' }],
      dependencies: [
        { id: 'junit', scope: 'test', path: path.join(tmpDir, 'junit.jar'), module: { name: 'junit' } },
        { id: 'legacy', scope: 'test', path: path.join(tmpDir, 'legacy.jar') },
      ],
    }).run();

    expect(plan.moduleOptions).toEqual([
      { name: '--add-modules', value: 'junit' },
      { name: '--add-reads', value: 'app=junit,ALL-UNNAMED' },
    ]);
    expect(plan.stats.patchFiles).toBe(0);
  });

  it('writes the same --limit-modules for every patch that declares it', () => {
    touch('a/m/a/A.java');
    touch('a/module-info-patch.txt', 'patch-module m.a { limit-modules java.base; }');
    touch('b/m/b/B.java');
    touch('b/module-info-patch.txt', 'patch-module m.b { limit-modules java.base; }');

    const plan = new CompilePlanner({
      projectRoot: tmpDir,
      scope: 'test',
      outputDirectory: path.join(tmpDir, 'out'),
      sourceRoots: [
        { path: 'a', module: 'm.a' },
        { path: 'b', module: 'm.b' },
      ],
    }).run();

    expect(plan.moduleOptions).toEqual([
      { name: '--limit-modules', value: 'java.base' },
      { name: '--limit-modules', value: 'java.base' },
    ]);
    expect(plan.stats.patchFiles).toBe(2);
  });

  it('keeps a module named __proto__ as an own key of the unit roots', () => {
    touch('src/p/P.java');
    const outDir = path.join(tmpDir, 'plan');

    const plan = new CompilePlanner(
      {
        projectRoot: tmpDir,
        outputDirectory: path.join(tmpDir, 'out'),
        sourceRoots: [{ path: 'src', module: '__proto__' }],
      },
      { outputDir: outDir },
    ).run();

    const roots = plan.units[0]?.roots ?? {};
    expect(Object.keys(roots)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(roots, '__proto__')?.value).toEqual([path.join(tmpDir, 'src')]);
    expect(fs.readFileSync(path.join(outDir, PLAN_FILE_NAME), 'utf-8')).toContain('"__proto__": [');
  });

  it('fails with the patch file location on a syntax error', () => {
    touch('src/test/java/app/FooTest.java');
    touch('src/test/java/module-info-patch.txt', 'patch-module app {\n  add-reads X Y;\n}\n');
    const patchFile = path.join(tmpDir, 'src/test/java/module-info-patch.txt');

    let error: unknown;
    try {
      new CompilePlanner({
        projectRoot: tmpDir,
        scope: 'test',
        outputDirectory: path.join(tmpDir, 'out'),
        mainModuleName: 'app',
        sourceRoots: [{ path: 'src/test/java' }],
      }).run();
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(PatchSyntaxError);
    if (!(error instanceof PatchSyntaxError)) return;
    expect(error.fileName).toBe(patchFile);
    expect(error.message).toBe(`Expected "," or ";" but found "Y" (${patchFile}:2:15)`);
  });
});
