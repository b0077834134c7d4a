import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const JobStatus = z.enum(['pending', 'planning', 'running', 'completed', 'failed', 'aborted']);
export type JobStatus = z.infer<typeof JobStatus>;

// `skipped` is reserved for conditional plans; the base engine never produces it.
export const StepStatus = z.enum(['pending', 'running', 'succeeded', 'failed', 'skipped']);
export type StepStatus = z.infer<typeof StepStatus>;

export const ToolErrorKind = z.enum(['ToolNotFound', 'ToolExecutionError', 'ToolTimeout']);
export type ToolErrorKind = z.infer<typeof ToolErrorKind>;

export const ToolError = z.object({
  kind: ToolErrorKind,
  message: z.string()
});
export type ToolError = z.infer<typeof ToolError>;

/** Artifact name → reference (a path or a content handle). */
export const ArtifactMap = z.record(z.string());
export type ArtifactMap = z.infer<typeof ArtifactMap>;

export const ToolSuccess = z.object({
  ok: z.literal(true),
  payload: z.unknown(),
  artifacts: ArtifactMap.optional(),
  durationMs: z.number().nonnegative()
});

export const ToolFailure = z.object({
  ok: z.literal(false),
  error: ToolError,
  durationMs: z.number().nonnegative()
});

export const ToolResult = z.discriminatedUnion('ok', [ToolSuccess, ToolFailure]);
export type ToolSuccess = z.infer<typeof ToolSuccess>;
export type ToolFailure = z.infer<typeof ToolFailure>;
export type ToolResult = z.infer<typeof ToolResult>;

export const StepParameters = z.record(z.unknown());
export type StepParameters = z.infer<typeof StepParameters>;

export const Step = z.object({
  index: z.number().int().nonnegative(),
  toolName: z.string().min(1),
  parameters: StepParameters,
  status: StepStatus,
  result: ToolResult.nullable(),
  retryCount: z.number().int().nonnegative(),
  startedAt: TimestampIso.nullable(),
  endedAt: TimestampIso.nullable()
});
export type Step = z.infer<typeof Step>;

export const Job = z.object({
  id: z.string().min(1),
  task: z.string(),
  status: JobStatus,
  steps: z.array(Step),
  memoryContext: z.array(z.string()),
  artifacts: ArtifactMap,
  metadata: z.record(z.unknown()),
  createdAt: TimestampIso,
  updatedAt: TimestampIso
});
export type Job = z.infer<typeof Job>;

/** One validated entry of a plan, before it becomes a Step. */
export interface PlanEntry {
  toolName: string;
  parameters: StepParameters;
}
