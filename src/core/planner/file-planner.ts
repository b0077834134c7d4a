import { extname } from 'node:path';

import { errorMessage, readJson, readYaml } from '../../utils/fs.js';
import { PlanningError } from '../errors.js';
import type { PlanEntry } from '../job/types.js';
import { parsePlan } from './schema.js';
import type { PlannerGateway } from './types.js';

const YAML_EXTS = new Set(['.yaml', '.yml']);

/** Load a plan document (JSON or YAML) from disk. */
export async function readPlanFile(path: string, opts: { maxSteps?: number } = {}): Promise<PlanEntry[]> {
  let raw: unknown;
  try {
    raw = YAML_EXTS.has(extname(path).toLowerCase()) ? await readYaml(path) : await readJson(path);
  } catch (err) {
    throw new PlanningError(`Cannot read plan file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parsePlan(raw, opts);
}

/**
 * Planner for scripted runs: ignores the request and returns the plan stored in a file.
 */
export class FilePlanner implements PlannerGateway {
  constructor(
    private path: string,
    private opts: { maxSteps?: number } = {}
  ) {}

  async plan(): Promise<PlanEntry[]> {
    return await readPlanFile(this.path, this.opts);
  }
}
