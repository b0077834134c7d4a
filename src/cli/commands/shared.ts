import type { RunTaskOutcome } from '../../core/agent.js';
import type { ExecutionHooks } from '../../core/execution/engine.js';
import type { JobManager } from '../../core/job-manager.js';
import { errorMessage } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { installCliCancellation } from '../cancel.js';
import type { CommandResult } from '../context.js';
import { EXIT_OK, exitCodeForError, exitCodeForOutcome } from '../exit-codes.js';
import type { Renderer } from '../ui/renderer.js';

/** Engine hooks that draw progress through the renderer. */
export function renderHooks(r: Renderer): ExecutionHooks {
  return {
    onStepStart: ({ job, step }) => r.stepStart(step, job.steps.length),
    onStepFinish: ({ job, step, result }) => r.stepFinish(step, result, job.steps.length),
    onJobFinish: ({ job, outcome }) => r.jobFinished(job, outcome)
  };
}

/**
 * Run `fn` with Ctrl+C wired to abort the job: the abort is persisted first, then the
 * signal handed to `fn` fires so an in-flight tool call is cancelled as well.
 */
export async function withJobCancellation<T>(
  deps: { manager: JobManager; renderer: Renderer; logger: Logger },
  currentJobId: () => string | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const cancellation = installCliCancellation({
    onCancel: async () => {
      const jobId = currentJobId();
      deps.renderer.warn(jobId ? `Aborting job ${jobId} (press Ctrl+C again to force quit)...` : 'Cancelling...');
      if (jobId) await deps.manager.abort(jobId, 'cancelled from the terminal');
    },
    onError: (err) => deps.logger.warn('abort on cancel failed', { error: errorMessage(err) })
  });
  try {
    return await fn(cancellation.signal);
  } finally {
    cancellation.dispose();
  }
}

export function outcomeResult(jobId: string, outcome: RunTaskOutcome): CommandResult {
  const exitCode = exitCodeForOutcome(outcome);
  if (outcome.ok) return { ok: true, exitCode, jobId };
  const details =
    outcome.reason === 'planning'
      ? outcome.error.message
      : outcome.reason === 'aborted'
        ? `Job ${jobId} was aborted`
        : `Job ${jobId} failed${outcome.stepIndex !== undefined ? ` at step ${outcome.stepIndex}` : ''}`;
  return { ok: false, exitCode, jobId, details };
}

export function errorResult(err: unknown, jobId?: string): CommandResult {
  return { ok: false, exitCode: exitCodeForError(err), jobId, details: errorMessage(err) };
}

export function okResult(jobId?: string, details?: string): CommandResult {
  return { ok: true, exitCode: EXIT_OK, jobId, details };
}
