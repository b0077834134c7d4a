import { resolve } from 'node:path';

import { readPlanFile } from '../../core/planner/file-planner.js';
import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult, outcomeResult, renderHooks, withJobCancellation } from './shared.js';

export interface PlanCommandOptions extends CliContextOptions {
  jobId: string;
  file: string;
  /** Execute right after installing. */
  run?: boolean;
}

/** `tasklane plan <job-id> <file>`: install a plan from a JSON or YAML file. */
export async function runPlanCommand(opts: PlanCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { config, manager, logger } = await createCliContext(opts);
    const plan = await readPlanFile(resolve(opts.cwd ?? process.cwd(), opts.file), { maxSteps: config.maxPlanSteps });
    const job = await manager.installPlan(opts.jobId, plan);
    r.planReady(job);
    if (!opts.run) {
      r.dim(`Run it with: tasklane resume ${job.id}`);
      return okResult(job.id);
    }

    r.section('Execution');
    const outcome = await withJobCancellation({ manager, renderer: r, logger }, () => job.id, (signal) =>
      manager.execute(job.id, { signal, hooks: renderHooks(r) })
    );
    return outcomeResult(job.id, outcome);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
