import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

export interface CreateCommandOptions extends CliContextOptions {
  task: string;
}

/** `tasklane create <task>`: register a pending job without planning it. */
export async function runCreateCommand(opts: CreateCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { manager } = await createCliContext(opts);
    const jobId = await manager.createJob(opts.task);
    r.jobCreated(jobId, opts.task);
    return okResult(jobId);
  } catch (err) {
    return errorResult(err);
  }
}
