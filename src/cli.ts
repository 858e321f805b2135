#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for a planning run.
 *
 * Output layout:
 *   <outputDir>/javac.args | javac-test.args   - arguments for the default release
 *   <outputDir>/javac-test-<n>.args            - arguments for release <n>
 *   <outputDir>/compile-plan.json              - the whole plan
 *
 * Usage:
 *   compile-planner <plan.json> [outputDir] [--debug]
 */

import * as path from 'node:path';
import { CompilePlanner } from './orchestrator/compile-planner.js';
import { loadPlannerConfig } from './services/config-loader.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

const rawArgs = process.argv.slice(2);
const verbose = rawArgs.includes('--debug');
const positional = rawArgs.filter((a) => !a.startsWith('--'));
const [configPath, rawOutputDir] = positional;

if (configPath === undefined) {
  console.error('Usage: compile-planner <plan.json> [outputDir] [--debug]');
  console.error('');
  console.error('  plan.json  - planner configuration (source roots, output directories, dependencies)');
  console.error('  outputDir  - (optional) where argument files and compile-plan.json are written');
  console.error('               defaults to the parent of the configured outputDirectory');
  console.error('  --debug    - emit debug-level pipeline logs and keep a log file');
  process.exit(1);
}

const t0 = Date.now();

try {
  const cfg = loadPlannerConfig(configPath);
  const outputDir = path.resolve(rawOutputDir ?? path.dirname(cfg.outputDirectory));
  const logger = verbose ? new TeeLogger('debug') : new ConsoleLogger('warn');

  console.log('Compile planning starting…');
  console.log(`  config      : ${path.resolve(configPath)}`);
  console.log(`  projectRoot : ${cfg.projectRoot}`);
  console.log(`  scope       : ${cfg.scope ?? 'main'} (${cfg.mode ?? 'compile'})`);
  console.log(`  outputDir   : ${outputDir}`);

  const plan = new CompilePlanner(cfg, { outputDir, logger }).run();
  const elapsed = Date.now() - t0;

  const { stats } = plan;
  console.log('');
  console.log('Planning complete ✓');
  console.log(`  modular     : ${plan.modular ? 'yes' : 'no'}`);
  console.log(`  roots       : ${stats.sourceRoots}`);
  console.log(`  files       : ${stats.sourceFiles}`);
  console.log(`  units       : ${plan.units.map((u) => (u.release === 0 ? 'base' : u.release)).join(', ') || '(none)'}`);
  console.log(`  patches     : ${stats.modulePatches} (${stats.patchFiles} from files)`);
  console.log(`  elapsed     : ${elapsed} ms`);

  if (logger instanceof TeeLogger) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join(outputDir, 'logs', `plan-${timestamp}.log`);
    logger.flush(logPath);
    console.log(`  log         : ${logPath}`);
  }

  process.exit(0);
} catch (err) {
  const elapsed = Date.now() - t0;
  console.error('');
  console.error(`Planning FAILED after ${elapsed} ms`);
  console.error(err instanceof Error ? err.message : String(err));
  if (verbose && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
