import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { errorResult, okResult } from './shared.js';

/** `tasklane tools`: the catalog the planner sees. */
export async function runToolsCommand(opts: CliContextOptions): Promise<CommandResult> {
  try {
    const { registry } = await createCliContext(opts);
    getRenderer().toolTable(registry.catalog());
    return okResult();
  } catch (err) {
    return errorResult(err);
  }
}
