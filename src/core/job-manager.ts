import { isJobId, JobIdGenerator } from '../utils/id.js';
import { errorMessage } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { InvalidStateTransitionError, JobNotFoundError, PersistenceError, type PlanningError } from './errors.js';
import { ExecutionEngine, type ExecutionHooks, type ExecutionOutcome, type StepRecorder } from './execution/engine.js';
import { acquireJobLock, withRecordLock } from './job/lock.js';
import {
  ABORTABLE_JOB_STATES,
  RESUMABLE_JOB_STATES,
  assertJobState,
  assertStepState,
  requireStep,
  statusFromSteps
} from './job/status.js';
import { JobStore } from './job/store.js';
import type { ArtifactMap, Job, JobStatus, PlanEntry, Step, ToolResult } from './job/types.js';
import type { LedgerEntryInput } from './ledger/types.js';
import { LedgerWriter } from './ledger/writer.js';
import { DEFAULT_MAX_PLAN_STEPS, parsePlan } from './planner/schema.js';
import type { ToolRegistry } from './tools/registry.js';

export interface JobManagerOptions {
  logger?: Logger;
  /** Bound on each tool call during execution; `0` disables it. */
  stepTimeoutMs?: number;
  maxPlanSteps?: number;
  hooks?: ExecutionHooks;
  idGenerator?: JobIdGenerator;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  hooks?: ExecutionHooks;
}

export interface ListJobsOptions {
  status?: JobStatus;
}

const PENDING_ONLY: ReadonlySet<JobStatus> = new Set(['pending']);
const PLANNABLE: ReadonlySet<JobStatus> = new Set(['pending', 'planning']);
const RUNNING_ONLY: ReadonlySet<JobStatus> = new Set(['running']);
const FAILED_ONLY: ReadonlySet<JobStatus> = new Set(['failed']);

/**
 * Owner of the job/step state machine.
 *
 * Every mutation reloads the record, applies the transition to that copy and commits the whole
 * document before resolving, all under the job's record lock, so mutations from other managers
 * and other processes never interleave. Execution (`resume`, `retryStep`, `execute`)
 * additionally holds the job's execution lock for its whole duration.
 */
export class JobManager implements StepRecorder {
  readonly store: JobStore;
  private engine: ExecutionEngine;
  private ids: JobIdGenerator;
  private now: () => Date;
  private maxPlanSteps: number;
  private logger?: Logger;

  constructor(
    stateDir: string,
    readonly registry: ToolRegistry,
    opts: JobManagerOptions = {}
  ) {
    this.logger = opts.logger;
    this.store = new JobStore(stateDir, opts.logger);
    this.ids = opts.idGenerator ?? new JobIdGenerator();
    this.now = opts.now ?? (() => new Date());
    this.maxPlanSteps = opts.maxPlanSteps ?? DEFAULT_MAX_PLAN_STEPS;
    this.engine = new ExecutionEngine(this, registry, {
      stepTimeoutMs: opts.stepTimeoutMs,
      hooks: opts.hooks,
      logger: opts.logger
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  async createJob(task: string, opts: { metadata?: Record<string, unknown> } = {}): Promise<string> {
    const ts = this.now().toISOString();
    let id = this.ids.next(this.now());
    // A random suffix can collide; never overwrite an existing record.
    for (let attempt = 0; (await this.store.exists(id)) && attempt < 5; attempt++) id = this.ids.next(this.now());
    if (await this.store.exists(id)) throw new PersistenceError(`Could not allocate a free job id (last tried '${id}')`);

    const job: Job = {
      id,
      task,
      status: 'pending',
      steps: [],
      memoryContext: [],
      artifacts: {},
      metadata: { ...opts.metadata },
      createdAt: ts,
      updatedAt: ts
    };
    await this.store.write(job);
    await this.appendLedger(id, [{ type: 'job_created', data: { jobId: id, task } }]);
    this.logger?.info('job created', { jobId: id });
    return id;
  }

  /** `pending → planning`; `memoryContext` is written once here and never changed afterwards. */
  async beginPlanning(jobId: string, memoryContext: string[] = []): Promise<Job> {
    return await this.mutate(jobId, (job) => {
      assertJobState(job, PENDING_ONLY, 'begin planning for');
      job.status = 'planning';
      job.memoryContext = [...memoryContext];
      return [{ type: 'planning_started', data: { memoryContext: memoryContext.length } }];
    });
  }

  async installPlan(jobId: string, entries: readonly PlanEntry[]): Promise<Job> {
    // Validated before touching the record: a rejected plan leaves the job as it was.
    const plan = parsePlan(entries, { maxSteps: this.maxPlanSteps });
    return await this.mutate(jobId, (job) => {
      assertJobState(job, PLANNABLE, 'install a plan on');
      job.steps = plan.map(
        (entry, index): Step => ({
          index,
          toolName: entry.toolName,
          parameters: entry.parameters,
          status: 'pending',
          result: null,
          retryCount: 0,
          startedAt: null,
          endedAt: null
        })
      );
      job.status = 'running';
      return [{ type: 'plan_installed', data: { steps: plan.length, tools: plan.map((e) => e.toolName) } }];
    });
  }

  /** The planner gave up: the job fails with no steps and keeps the reason in its metadata. */
  async failPlanning(jobId: string, error: PlanningError): Promise<Job> {
    return await this.mutate(jobId, (job) => {
      assertJobState(job, PLANNABLE, 'fail planning for');
      job.status = 'failed';
      job.metadata = { ...job.metadata, planningError: error.message };
      return [
        { type: 'planning_failed', data: { message: error.message, issues: error.issues } },
        { type: 'job_failed', data: { reason: 'planning' } }
      ];
    });
  }

  // ── Step transitions (driven by the engine) ────────────────────────────

  async startStep(jobId: string, stepIndex: number): Promise<Job> {
    return await this.mutate(jobId, (job) => {
      assertJobState(job, RUNNING_ONLY, 'start a step of');
      const step = requireStep(job, stepIndex, 'start a step of');
      assertStepState(job, step, 'pending', 'start a step of');
      step.status = 'running';
      step.startedAt = this.now().toISOString();
      step.endedAt = null;
      return [{ type: 'step_started', data: { stepIndex, toolName: step.toolName, attempt: step.retryCount + 1 } }];
    });
  }

  async recordStepResult(jobId: string, stepIndex: number, result: ToolResult): Promise<Job> {
    return await this.mutate(jobId, (job) => {
      assertJobState(job, RUNNING_ONLY, 'record a step result for');
      const step = requireStep(job, stepIndex, 'record a step result for');
      assertStepState(job, step, 'running', 'record a step result for');

      step.result = result;
      step.endedAt = this.now().toISOString();

      if (result.ok) {
        step.status = 'succeeded';
        if (result.artifacts) job.artifacts = appendArtifacts(job.artifacts, result.artifacts, stepIndex);
      } else {
        step.status = 'failed';
      }
      job.status = statusFromSteps(job.steps);

      const events: LedgerEntryInput[] = [
        result.ok
          ? {
              type: 'step_succeeded',
              data: { stepIndex, toolName: step.toolName, durationMs: result.durationMs }
            }
          : {
              type: 'step_failed',
              data: {
                stepIndex,
                toolName: step.toolName,
                durationMs: result.durationMs,
                errorKind: result.error.kind,
                message: result.error.message
              }
            }
      ];
      if (job.status === 'completed') events.push({ type: 'job_completed', data: { steps: job.steps.length } });
      if (job.status === 'failed') events.push({ type: 'job_failed', data: { reason: 'step', stepIndex } });
      return events;
    });
  }

  async discardStepResult(jobId: string, stepIndex: number, result: ToolResult): Promise<void> {
    await this.appendLedger(jobId, [
      {
        type: 'step_discarded',
        data: { stepIndex, ok: result.ok, durationMs: result.durationMs }
      }
    ]);
  }

  // ── Execution ──────────────────────────────────────────────────────────

  /** Run the steps of a `running` job (right after `installPlan`). */
  async execute(jobId: string, opts: RunOptions = {}): Promise<ExecutionOutcome> {
    return await this.withLock(jobId, async () => await this.engine.run(jobId, opts));
  }

  /**
   * Re-enter the loop at the first step that has not succeeded. Steps left `failed`, or
   * `running` by a crashed process, go back to `pending` with their retry count bumped.
   */
  async resume(jobId: string, opts: RunOptions = {}): Promise<ExecutionOutcome> {
    return await this.withLock(jobId, async () => {
      await this.mutate(jobId, (job) => {
        assertJobState(job, RESUMABLE_JOB_STATES, 'resume');
        if (job.steps.length === 0) {
          throw new InvalidStateTransitionError(job.id, job.status, 'resume', 'job has no steps');
        }
        const reset: number[] = [];
        for (const step of job.steps) {
          if (step.status === 'failed' || step.status === 'running') {
            resetStep(step);
            reset.push(step.index);
          }
        }
        job.status = 'running';
        return [{ type: 'job_resumed', data: { resetSteps: reset } }];
      });
      return await this.engine.run(jobId, opts);
    });
  }

  async retryStep(jobId: string, stepIndex: number, opts: RunOptions = {}): Promise<ExecutionOutcome> {
    return await this.withLock(jobId, async () => {
      await this.mutate(jobId, (job) => {
        const step = requireStep(job, stepIndex, 'retry');
        assertJobState(job, FAILED_ONLY, 'retry');
        assertStepState(job, step, 'failed', 'retry');
        resetStep(step);
        job.status = 'running';
        return [{ type: 'step_retried', data: { stepIndex, retryCount: step.retryCount } }];
      });
      return await this.engine.run(jobId, opts);
    });
  }

  /**
   * Mark the job aborted. Takes effect for an executing job at its next step boundary.
   * Aborting an already aborted job is a no-op.
   */
  async abort(jobId: string, reason?: string): Promise<Job> {
    return await this.exclusive(jobId, async () => {
      const job = await this.store.read(jobId);
      if (job.status === 'aborted') return job;
      assertJobState(job, ABORTABLE_JOB_STATES, 'abort');
      const from = job.status;
      job.status = 'aborted';
      if (reason) job.metadata = { ...job.metadata, abortReason: reason };
      return await this.commit(job, [{ type: 'job_aborted', data: { from, reason: reason ?? null } }]);
    });
  }

  // ── Metadata ───────────────────────────────────────────────────────────

  async setMetadata(jobId: string, key: string, value: unknown): Promise<Job> {
    if (!key) throw new Error('Metadata key must be a non-empty string');
    return await this.mutate(jobId, (job) => {
      job.metadata = { ...job.metadata, [key]: value };
      return [{ type: 'metadata_set', data: { key } }];
    });
  }

  // ── Queries ────────────────────────────────────────────────────────────

  async getJob(jobId: string): Promise<Job> {
    return await this.store.read(jobId);
  }

  /** Most recently updated first. */
  async listJobs(limit = 10, opts: ListJobsOptions = {}): Promise<Job[]> {
    if (limit <= 0) return [];
    const jobs = await this.store.readAll();
    return jobs
      .filter((j) => !opts.status || j.status === opts.status)
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt) || b.id.localeCompare(a.id))
      .slice(0, limit);
  }

  ledgerPath(jobId: string): string {
    return this.store.paths(jobId).ledgerPath;
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async mutate(jobId: string, apply: (job: Job) => LedgerEntryInput[]): Promise<Job> {
    return await this.exclusive(jobId, async () => {
      const job = await this.store.read(jobId);
      const events = apply(job);
      return await this.commit(job, events);
    });
  }

  private async exclusive<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    // Ids double as directory names; anything else never reaches the filesystem.
    if (!isJobId(jobId)) throw new JobNotFoundError(jobId);
    return await withRecordLock(jobId, this.store.paths(jobId).recordLockPath, fn, { logger: this.logger });
  }

  private async commit(job: Job, events: LedgerEntryInput[]): Promise<Job> {
    job.updatedAt = this.now().toISOString();
    await this.store.write(job);
    await this.appendLedger(job.id, events);
    return job;
  }

  private async withLock<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    // Existence first, so a missing job is reported as such and no lock file is left behind.
    if (!(await this.store.exists(jobId))) throw new JobNotFoundError(jobId);
    const lock = await acquireJobLock(jobId, this.store.paths(jobId).lockPath, this.logger);
    try {
      return await fn();
    } finally {
      await lock.release();
    }
  }

  // The record is authoritative; a ledger write that fails is reported, not propagated.
  private async appendLedger(jobId: string, events: LedgerEntryInput[]): Promise<void> {
    if (events.length === 0) return;
    try {
      const writer = await LedgerWriter.open(this.ledgerPath(jobId));
      for (const event of events) await writer.append(event);
    } catch (err) {
      this.logger?.warn('ledger append failed', { jobId, error: errorMessage(err) });
    }
  }
}

/**
 * Artifacts are append-only: a name already bound to a different reference is published
 * again as `<name>@<stepIndex>`.
 */
export function appendArtifacts(current: ArtifactMap, produced: ArtifactMap, stepIndex: number): ArtifactMap {
  const out = { ...current };
  for (const [name, ref] of Object.entries(produced)) {
    if (!Object.hasOwn(out, name)) out[name] = ref;
    else if (out[name] !== ref) out[`${name}@${stepIndex}`] = ref;
  }
  return out;
}

function resetStep(step: Step): void {
  step.status = 'pending';
  step.result = null;
  step.startedAt = null;
  step.endedAt = null;
  step.retryCount += 1;
}
