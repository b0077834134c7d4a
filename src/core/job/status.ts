import { InvalidStateTransitionError } from '../errors.js';
import type { Job, JobStatus, Step, StepStatus } from './types.js';

export const TERMINAL_JOB_STATES: ReadonlySet<JobStatus> = new Set(['completed', 'aborted']);

/** States from which `resume` may re-enter the execution loop (`running` covers a crash mid-run). */
export const RESUMABLE_JOB_STATES: ReadonlySet<JobStatus> = new Set(['failed', 'running']);

export const ABORTABLE_JOB_STATES: ReadonlySet<JobStatus> = new Set(['pending', 'planning', 'running', 'failed']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_JOB_STATES.has(status);
}

export function assertJobState(job: Job, allowed: ReadonlySet<JobStatus>, operation: string, detail?: string): void {
  if (!allowed.has(job.status)) {
    throw new InvalidStateTransitionError(job.id, job.status, operation, detail);
  }
}

export function requireStep(job: Job, stepIndex: number, operation: string): Step {
  const step = Number.isInteger(stepIndex) ? job.steps[stepIndex] : undefined;
  if (!step) {
    throw new InvalidStateTransitionError(
      job.id,
      job.status,
      operation,
      `step ${stepIndex} does not exist (job has ${job.steps.length} steps)`
    );
  }
  return step;
}

export function assertStepState(job: Job, step: Step, expected: StepStatus, operation: string): void {
  if (step.status !== expected) {
    throw new InvalidStateTransitionError(
      job.id,
      job.status,
      operation,
      `step ${step.index} is '${step.status}', expected '${expected}'`
    );
  }
}

/** The step execution resumes from: the first one that has not succeeded. */
export function firstIncompleteStep(job: Job): Step | undefined {
  return job.steps.find((s) => s.status !== 'succeeded');
}

/**
 * Job status implied by the step statuses of a job that is executing.
 * Any failure fails the job; only an all-succeeded plan completes it.
 */
export function statusFromSteps(steps: readonly Step[]): JobStatus {
  if (steps.some((s) => s.status === 'failed')) return 'failed';
  if (steps.length > 0 && steps.every((s) => s.status === 'succeeded')) return 'completed';
  return 'running';
}

export interface StepCounts {
  total: number;
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export function countSteps(job: Job): StepCounts {
  const counts: StepCounts = { total: job.steps.length, pending: 0, running: 0, succeeded: 0, failed: 0, skipped: 0 };
  for (const s of job.steps) counts[s.status] += 1;
  return counts;
}
