import { LedgerReader } from '../../core/ledger/reader.js';
import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

export interface HistoryCommandOptions extends CliContextOptions {
  jobId: string;
  /** Only the last N events. */
  tail?: number;
}

/** `tasklane history <job-id>`: the job's event ledger. */
export async function runHistoryCommand(opts: HistoryCommandOptions): Promise<CommandResult> {
  try {
    const { manager } = await createCliContext(opts);
    // Resolves the id (and raises JobNotFound) before touching the ledger.
    const job = await manager.getJob(opts.jobId);
    const { entries, warnings } = await new LedgerReader(manager.ledgerPath(job.id)).readAllSafe();
    const shown = opts.tail && opts.tail > 0 ? entries.slice(-opts.tail) : entries;
    getRenderer().ledger(job.id, shown, warnings);
    return okResult(job.id);
  } catch (err) {
    return errorResult(err, opts.jobId);
  }
}
