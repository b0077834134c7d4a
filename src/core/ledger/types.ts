import { z } from 'zod';

import { TimestampIso } from '../job/types.js';

export const LedgerEnvelope = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: z.string(),
  data: z.unknown()
});

// Canonical event types. The job record is authoritative; the ledger is the audit trail.
export const LedgerEventType = z.enum([
  'job_created',
  'planning_started',
  'planning_failed',
  'plan_installed',
  'step_started',
  'step_succeeded',
  'step_failed',
  'step_retried',
  'step_discarded',
  'job_resumed',
  'job_completed',
  'job_failed',
  'job_aborted',
  'metadata_set'
]);
export type LedgerEventType = z.infer<typeof LedgerEventType>;

export const JobCreatedEvent = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: z.literal('job_created'),
  data: z.object({
    jobId: z.string(),
    task: z.string()
  })
});

export const PlanInstalledEvent = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: z.literal('plan_installed'),
  data: z.object({
    steps: z.number().int().nonnegative(),
    tools: z.array(z.string())
  })
});

export const StepFinishedEvent = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: z.enum(['step_succeeded', 'step_failed']),
  data: z.object({
    stepIndex: z.number().int().nonnegative(),
    toolName: z.string(),
    durationMs: z.number().nonnegative(),
    errorKind: z.string().optional(),
    message: z.string().optional()
  })
});

export const LedgerEntrySchema = z.union([JobCreatedEvent, PlanInstalledEvent, StepFinishedEvent, LedgerEnvelope]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export interface LedgerEntryInput {
  type: LedgerEventType;
  data: Record<string, unknown>;
}
