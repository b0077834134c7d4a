import { JobStatus } from '../../core/job/types.js';
import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { EXIT_UNEXPECTED } from '../exit-codes.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

export interface ListCommandOptions extends CliContextOptions {
  limit?: number;
  status?: string;
}

/** `tasklane list [--limit n] [--status s]`: most recently updated first. */
export async function runListCommand(opts: ListCommandOptions): Promise<CommandResult> {
  const limit = opts.limit ?? 10;
  if (!Number.isInteger(limit) || limit < 1) {
    return { ok: false, exitCode: EXIT_UNEXPECTED, details: `--limit must be a positive integer (got ${String(opts.limit)})` };
  }
  const status = opts.status === undefined ? undefined : JobStatus.safeParse(opts.status);
  if (status && !status.success) {
    return {
      ok: false,
      exitCode: EXIT_UNEXPECTED,
      details: `--status must be one of ${JobStatus.options.join(', ')} (got '${opts.status}')`
    };
  }

  try {
    const { manager } = await createCliContext(opts);
    const jobs = await manager.listJobs(limit, { status: status?.data });
    getRenderer().jobTable(jobs);
    return okResult();
  } catch (err) {
    return errorResult(err);
  }
}
