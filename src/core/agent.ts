import { errorMessage } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { InvalidStateTransitionError, PlanningError } from './errors.js';
import type { ExecutionHooks, ExecutionOutcome } from './execution/engine.js';
import type { JobManager } from './job-manager.js';
import type { Job, PlanEntry } from './job/types.js';
import { summarizeJob } from './memory/jsonl-store.js';
import type { MemoryStore } from './memory/types.js';
import type { PlannerGateway } from './planner/types.js';

export interface RunTaskHooks extends ExecutionHooks {
  onJobCreated?: (args: { jobId: string }) => void;
  onMemory?: (args: { jobId: string; matches: string[] }) => void;
  onPlanningStart?: (args: { jobId: string }) => void;
  onPlanReady?: (args: { job: Job; plan: PlanEntry[] }) => void;
}

export interface RunTaskOptions {
  manager: JobManager;
  planner: PlannerGateway;
  memory?: MemoryStore;
  /** Past-task summaries to request from memory. */
  memoryLimit?: number;
  metadata?: Record<string, unknown>;
  signal?: AbortSignal;
  hooks?: RunTaskHooks;
  logger?: Logger;
}

export type RunTaskOutcome = ExecutionOutcome | { ok: false; reason: 'planning'; error: PlanningError };

export interface RunTaskResult {
  jobId: string;
  outcome: RunTaskOutcome;
}

/**
 * End-to-end task flow: create the job, gather similar past tasks, plan, execute, and
 * remember how it went. A planner failure fails the job instead of throwing.
 */
export async function runTask(task: string, opts: RunTaskOptions): Promise<RunTaskResult> {
  const { manager, planner, memory, hooks = {}, logger } = opts;
  const jobId = await manager.createJob(task, { metadata: opts.metadata });
  hooks.onJobCreated?.({ jobId });

  const matches = memory ? await recall(memory, task, opts.memoryLimit ?? 3, jobId, logger) : [];
  if (matches.length) hooks.onMemory?.({ jobId, matches });

  await manager.beginPlanning(jobId, matches);
  hooks.onPlanningStart?.({ jobId });

  let plan: PlanEntry[];
  try {
    plan = await planner.plan(
      { task, memoryContext: matches, toolCatalog: manager.registry.catalog() },
      { signal: opts.signal }
    );
  } catch (err) {
    const error = err instanceof PlanningError ? err : new PlanningError(errorMessage(err), { cause: err });
    logger?.warn('planning failed', { jobId, error: error.message });
    return await planningFailed(opts, jobId, error);
  }

  let installed: Job;
  try {
    installed = await manager.installPlan(jobId, plan);
  } catch (err) {
    if (err instanceof PlanningError) return await planningFailed(opts, jobId, err);
    if (err instanceof InvalidStateTransitionError && (await manager.getJob(jobId)).status === 'aborted') {
      return { jobId, outcome: { ok: false, reason: 'aborted' } };
    }
    throw err;
  }
  hooks.onPlanReady?.({ job: installed, plan });

  const outcome = await manager.execute(jobId, { signal: opts.signal, hooks });
  if (memory) await remember(memory, await manager.getJob(jobId), logger);
  return { jobId, outcome };
}

// An abort that arrived while the planner ran wins over the planning failure.
async function planningFailed(opts: RunTaskOptions, jobId: string, error: PlanningError): Promise<RunTaskResult> {
  const { manager, memory, logger } = opts;
  const current = await manager.getJob(jobId);
  if (current.status === 'aborted') return { jobId, outcome: { ok: false, reason: 'aborted' } };

  const failed = await manager.failPlanning(jobId, error);
  if (memory) await remember(memory, failed, logger);
  return { jobId, outcome: { ok: false, reason: 'planning', error } };
}

// Memory only biases the planner; without it the task is planned from scratch.
async function recall(memory: MemoryStore, task: string, limit: number, jobId: string, logger?: Logger): Promise<string[]> {
  try {
    return await memory.search(task, limit);
  } catch (err) {
    logger?.warn('could not search memory', { jobId, error: errorMessage(err) });
    return [];
  }
}

async function remember(memory: MemoryStore, job: Job, logger?: Logger): Promise<void> {
  try {
    await memory.record({ jobId: job.id, task: job.task, status: job.status, summary: summarizeJob(job) });
  } catch (err) {
    logger?.warn('could not record task in memory', { jobId: job.id, error: errorMessage(err) });
  }
}
