import { resolve } from 'node:path';

import { runTask } from '../../core/agent.js';
import { CommandPlanner } from '../../core/planner/command-planner.js';
import { FilePlanner } from '../../core/planner/file-planner.js';
import type { PlannerGateway } from '../../core/planner/types.js';
import { createCliContext, type CliContextOptions, type CommandResult } from '../context.js';
import { EXIT_CANCELLED, EXIT_UNEXPECTED } from '../exit-codes.js';
import { promptInput } from '../ui/prompts.js';
import { getRenderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';
import { errorResult, outcomeResult, renderHooks, withJobCancellation } from './shared.js';

export interface RunCommandOptions extends CliContextOptions {
  task?: string;
  /** Use a plan file instead of the configured planner command. */
  planFile?: string;
  /** Replaces the configured planner (tests). */
  planner?: PlannerGateway;
}

/**
 * `tasklane run [task]`: create a job, plan it, execute it. Prompts for the task when omitted.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const state: { jobId?: string; spinner?: SpinnerHandle } = {};

  try {
    const ctx = await createCliContext(opts);
    const { config, manager, memory, logger } = ctx;

    let task = opts.task?.trim() ?? '';
    if (!task) {
      try {
        task = (await promptInput({ message: 'Task description' })).trim();
      } catch (err) {
        if (err instanceof Error && err.name === 'ExitPromptError') {
          r.warn('Cancelled.');
          return { ok: false, exitCode: EXIT_CANCELLED, details: 'cancelled' };
        }
        throw err;
      }
    }
    if (!task) return { ok: false, exitCode: EXIT_UNEXPECTED, details: 'A task description is required' };

    const planner =
      opts.planner ??
      (opts.planFile
        ? new FilePlanner(resolve(opts.cwd ?? process.cwd(), opts.planFile), { maxSteps: config.maxPlanSteps })
        : new CommandPlanner({
            ...config.planner,
            maxSteps: config.maxPlanSteps,
            cwd: config.workspaceDir,
            logger: logger.child({ component: 'planner' })
          }));

    const result = await withJobCancellation({ manager, renderer: r, logger }, () => state.jobId, (signal) =>
      runTask(task, {
        manager,
        planner,
        memory,
        memoryLimit: config.memory.limit,
        signal,
        logger,
        hooks: {
          onJobCreated: ({ jobId }) => {
            state.jobId = jobId;
            r.jobCreated(jobId, task);
          },
          onMemory: ({ matches }) => r.memoryMatches(matches),
          onPlanningStart: () => {
            state.spinner = r.spinner('Planning...');
          },
          onPlanReady: ({ job }) => {
            state.spinner?.succeed(`Planned ${job.steps.length} step${job.steps.length === 1 ? '' : 's'}`);
            state.spinner = undefined;
            r.planReady(job);
            r.section('Execution');
          },
          ...renderHooks(r)
        }
      })
    );

    if (!result.outcome.ok && result.outcome.reason === 'planning') {
      state.spinner?.fail('Planning failed');
    } else if (!result.outcome.ok && result.outcome.reason === 'aborted') {
      state.spinner?.warn('Aborted');
    }
    return outcomeResult(result.jobId, result.outcome);
  } catch (err) {
    state.spinner?.stop();
    return errorResult(err, state.jobId);
  }
}
