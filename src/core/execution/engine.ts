import type { Logger } from '../../utils/logger.js';
import { InvalidStateTransitionError } from '../errors.js';
import { firstIncompleteStep } from '../job/status.js';
import type { Job, Step, ToolResult } from '../job/types.js';
import type { ToolRegistry } from '../tools/registry.js';

/** The slice of JobManager the loop drives. Every call persists before it resolves. */
export interface StepRecorder {
  getJob(jobId: string): Promise<Job>;
  startStep(jobId: string, stepIndex: number): Promise<Job>;
  recordStepResult(jobId: string, stepIndex: number, result: ToolResult): Promise<Job>;
  /** Note a result that arrived after the job was aborted and was not stored. */
  discardStepResult(jobId: string, stepIndex: number, result: ToolResult): Promise<void>;
}

export type ExecutionOutcome =
  | { ok: true; status: 'completed' }
  | { ok: false; reason: 'failed' | 'aborted'; stepIndex?: number };

export interface ExecutionHooks {
  onStepStart?: (args: { job: Job; step: Step }) => void;
  onStepFinish?: (args: { job: Job; step: Step; result: ToolResult }) => void;
  onJobFinish?: (args: { job: Job; outcome: ExecutionOutcome }) => void;
}

export interface ExecutionEngineOptions {
  /** Bound on each tool call; `0` disables it. */
  stepTimeoutMs?: number;
  hooks?: ExecutionHooks;
  logger?: Logger;
}

/**
 * Sequential, fail-fast step loop. Aborts are noticed between steps by reloading the
 * record; a call already in flight runs to completion (or timeout) and its result is dropped.
 */
export class ExecutionEngine {
  constructor(
    private jobs: StepRecorder,
    private registry: ToolRegistry,
    private opts: ExecutionEngineOptions = {}
  ) {}

  async run(jobId: string, options: { signal?: AbortSignal; hooks?: ExecutionHooks } = {}): Promise<ExecutionOutcome> {
    const hooks = { ...this.opts.hooks, ...options.hooks };
    const logger = this.opts.logger?.child({ jobId });

    const finish = (job: Job, outcome: ExecutionOutcome): ExecutionOutcome => {
      logger?.info('execution finished', { status: job.status, ...outcome });
      hooks.onJobFinish?.({ job, outcome });
      return outcome;
    };

    while (true) {
      const job = await this.jobs.getJob(jobId);
      if (job.status === 'aborted') return finish(job, { ok: false, reason: 'aborted' });
      if (job.status === 'completed') return finish(job, { ok: true, status: 'completed' });
      if (job.status !== 'running') {
        throw new InvalidStateTransitionError(job.id, job.status, 'execute');
      }

      const pending = firstIncompleteStep(job);
      if (!pending) return finish(job, { ok: true, status: 'completed' });
      // Caller cancelled without aborting the job: stop here and leave it resumable.
      if (options.signal?.aborted) return finish(job, { ok: false, reason: 'aborted', stepIndex: pending.index });

      let started: Job;
      try {
        started = await this.jobs.startStep(jobId, pending.index);
      } catch (err) {
        const aborted = await this.abortedSince(err, jobId);
        if (aborted) return finish(aborted, { ok: false, reason: 'aborted', stepIndex: pending.index });
        throw err;
      }
      const step = started.steps[pending.index];
      hooks.onStepStart?.({ job: started, step });
      logger?.debug('step started', { stepIndex: step.index, toolName: step.toolName });

      const result = await this.registry.execute(step.toolName, step.parameters, {
        timeoutMs: this.opts.stepTimeoutMs,
        signal: options.signal,
        jobId,
        stepIndex: step.index,
        artifacts: started.artifacts
      });

      let recorded: Job;
      try {
        recorded = await this.jobs.recordStepResult(jobId, step.index, result);
      } catch (err) {
        const aborted = await this.abortedSince(err, jobId);
        if (aborted) {
          logger?.warn('discarding result of step finished after abort', { stepIndex: step.index });
          await this.jobs.discardStepResult(jobId, step.index, result);
          return finish(aborted, { ok: false, reason: 'aborted', stepIndex: step.index });
        }
        throw err;
      }
      hooks.onStepFinish?.({ job: recorded, step: recorded.steps[step.index], result });

      if (!result.ok) return finish(recorded, { ok: false, reason: 'failed', stepIndex: step.index });
    }
  }

  /** The reloaded job when `err` is a rejected transition caused by an abort; otherwise null. */
  private async abortedSince(err: unknown, jobId: string): Promise<Job | null> {
    if (!(err instanceof InvalidStateTransitionError)) return null;
    const job = await this.jobs.getJob(jobId);
    return job.status === 'aborted' ? job : null;
  }
}
