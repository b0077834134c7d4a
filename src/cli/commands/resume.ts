import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';
import { errorResult, outcomeResult, renderHooks, withJobCancellation } from './shared.js';

export interface ResumeCommandOptions extends CliContextOptions {
  jobId: string;
}

/**
 * `tasklane resume <job-id>`: continue a failed or interrupted job from its first step that
 * has not succeeded.
 */
export async function runResumeCommand(opts: ResumeCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { manager, logger } = await createCliContext(opts);
    r.info(`Resuming job ${theme.bold(opts.jobId)}...`);
    const outcome = await withJobCancellation({ manager, renderer: r, logger }, () => opts.jobId, (signal) =>
      manager.resume(opts.jobId, { signal, hooks: renderHooks(r) })
    );
    return outcomeResult(opts.jobId, outcome);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
