import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

export interface AbortCommandOptions extends CliContextOptions {
  jobId: string;
  reason?: string;
}

/** `tasklane abort <job-id>`: a running job stops at its next step boundary. */
export async function runAbortCommand(opts: AbortCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { manager } = await createCliContext(opts);
    const job = await manager.abort(opts.jobId, opts.reason);
    r.success(`Job ${job.id} aborted`);
    return okResult(job.id);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
