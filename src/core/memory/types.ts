import { z } from 'zod';

import { JobStatus, TimestampIso } from '../job/types.js';

export const MemoryRecord = z.object({
  jobId: z.string(),
  task: z.string(),
  status: JobStatus,
  /** Free-text summary handed to the planner as context. */
  summary: z.string(),
  recordedAt: TimestampIso
});
export type MemoryRecord = z.infer<typeof MemoryRecord>;

export interface MemoryStore {
  /** Summaries of past tasks most similar to `task`, best first. */
  search(task: string, limit: number): Promise<string[]>;
  record(entry: Omit<MemoryRecord, 'recordedAt'>): Promise<MemoryRecord>;
}
