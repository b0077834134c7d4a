import { execa, ExecaError } from 'execa';

import { errorMessage } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { PlanningError } from '../errors.js';
import type { PlanEntry } from '../job/types.js';
import { buildPlannerPrompt } from './prompt.js';
import { parsePlanText } from './schema.js';
import type { PlannerGateway, PlanRequest } from './types.js';

export interface CommandPlannerOptions {
  /** Executable of the local model runner, e.g. `ollama`. */
  command: string;
  args?: string[];
  /** `prompt` sends a rendered prompt on stdin; `json` sends the raw request object. */
  input?: 'prompt' | 'json';
  timeoutMs?: number;
  maxSteps?: number;
  cwd?: string;
  logger?: Logger;
}

/**
 * Planner backed by an external process: the request goes to stdin, the plan is read from stdout.
 */
export class CommandPlanner implements PlannerGateway {
  constructor(private opts: CommandPlannerOptions) {}

  async plan(request: PlanRequest, options: { signal?: AbortSignal } = {}): Promise<PlanEntry[]> {
    const { command, args = [], input = 'prompt', timeoutMs, cwd, logger } = this.opts;
    const stdin = input === 'json' ? JSON.stringify(request) : buildPlannerPrompt(request);

    logger?.debug('planner invoked', { command, args, input, tools: request.toolCatalog.length });

    let stdout: string;
    try {
      const res = await execa(command, args, {
        input: stdin,
        cwd,
        timeout: timeoutMs && timeoutMs > 0 ? timeoutMs : undefined,
        cancelSignal: options.signal,
        stdout: 'pipe',
        stderr: 'pipe'
      });
      stdout = res.stdout;
      if (res.stderr.trim()) logger?.debug('planner stderr', { stderr: res.stderr.trim().slice(0, 2000) });
    } catch (err) {
      if (err instanceof ExecaError) {
        const reason = err.timedOut ? `timed out after ${timeoutMs}ms` : err.isCanceled ? 'cancelled' : err.shortMessage;
        throw new PlanningError(`Planner command '${command}' failed: ${reason}`, { cause: err });
      }
      throw new PlanningError(`Planner command '${command}' failed: ${errorMessage(err)}`, { cause: err });
    }

    const plan = parsePlanText(stdout, { maxSteps: this.opts.maxSteps });
    logger?.info('plan received', { steps: plan.length });
    return plan;
  }
}
