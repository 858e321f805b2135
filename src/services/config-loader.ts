/**
 * config-loader.ts
 * Reads a planner configuration file and resolves its paths.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { PlannerConfig } from '../models/planner-config.js';
import { FileReadError } from './file-service.js';
import { PlanValidator, ValidationError } from './plan-validator.js';

/**
 * Load `configPath` (JSON). `projectRoot` in the file is relative to the
 * file's own directory; the returned configuration has absolute paths only.
 */
export function loadPlannerConfig(configPath: string): PlannerConfig {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new FileReadError(resolved, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid plan configuration: ${resolved} is not valid JSON (${detail})`);
  }

  return PlanValidator.resolvePaths(PlanValidator.parseConfig(raw), path.dirname(resolved));
}
