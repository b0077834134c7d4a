import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';
import { errorResult, outcomeResult, renderHooks, withJobCancellation } from './shared.js';

export interface RetryCommandOptions extends CliContextOptions {
  jobId: string;
  /** 0-based step index. */
  stepIndex: number;
}

/** `tasklane retry <job-id> <step>`: re-run a failed step, then continue with the rest. */
export async function runRetryCommand(opts: RetryCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { manager, logger } = await createCliContext(opts);
    r.info(`Retrying step ${opts.stepIndex} of job ${theme.bold(opts.jobId)}...`);
    const outcome = await withJobCancellation({ manager, renderer: r, logger }, () => opts.jobId, (signal) =>
      manager.retryStep(opts.jobId, opts.stepIndex, { signal, hooks: renderHooks(r) })
    );
    return outcomeResult(opts.jobId, outcome);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
