import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

export interface ShowCommandOptions extends CliContextOptions {
  jobId: string;
  /** Print the raw record as JSON on stdout. */
  json?: boolean;
}

/** `tasklane show <job-id>` */
export async function runShowCommand(opts: ShowCommandOptions): Promise<CommandResult> {
  try {
    const { manager } = await createCliContext(opts);
    const job = await manager.getJob(opts.jobId);
    if (opts.json) process.stdout.write(`${JSON.stringify(job, null, 2)}\n`);
    else getRenderer().jobDetails(job);
    return okResult(job.id);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
