#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { errorMessage } from '../utils/fs.js';
import { runAbortCommand } from './commands/abort.js';
import { runCreateCommand } from './commands/create.js';
import { runHistoryCommand } from './commands/history.js';
import { runListCommand } from './commands/list.js';
import { runPlanCommand } from './commands/plan.js';
import { runResumeCommand } from './commands/resume.js';
import { runRetryCommand } from './commands/retry.js';
import { runRunCommand } from './commands/run.js';
import { runShowCommand } from './commands/show.js';
import { runToolsCommand } from './commands/tools.js';
import type { CliContextOptions, CommandResult } from './context.js';
import { EXIT_CANCELLED, EXIT_UNEXPECTED } from './exit-codes.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('tasklane')
    .description('Plan tasks into tool calls and run them as durable, resumable jobs')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('--config <path>', 'Config file (defaults to <state-dir>/config.yaml)');

  program.hook('preAction', () => {
    createRenderer({ quiet: Boolean(program.opts<GlobalFlags>().quiet) });
  });

  const ctx = (): CliContextOptions => {
    const o = program.opts<GlobalFlags>();
    return { verbose: Boolean(o.verbose), quiet: Boolean(o.quiet), configPath: o.config };
  };

  // ── Workflow ─────────────────────────────────────────────────────────────

  program
    .command('run')
    .description('Create a job for a task, plan it and execute it')
    .argument('[task]', 'Task description (prompted for when omitted)')
    .option('--plan <file>', 'Use a JSON or YAML plan file instead of the planner command')
    .action(async (task: string | undefined, opts: { plan?: string }) => {
      report('Run failed', await runRunCommand({ ...ctx(), task, planFile: opts.plan }), inspectTip);
    });

  program
    .command('create')
    .description('Register a pending job without planning it')
    .argument('<task>', 'Task description')
    .action(async (task: string) => {
      report('Create failed', await runCreateCommand({ ...ctx(), task }));
    });

  program
    .command('plan')
    .description('Install a plan file into a pending job')
    .argument('<job-id>', 'Job id')
    .argument('<file>', 'JSON or YAML plan file')
    .option('--run', 'Execute the job right away')
    .action(async (jobId: string, file: string, opts: { run?: boolean }) => {
      report('Plan failed', await runPlanCommand({ ...ctx(), jobId, file, run: Boolean(opts.run) }), inspectTip);
    });

  program
    .command('resume')
    .description('Continue a failed or interrupted job')
    .argument('<job-id>', 'Job id')
    .action(async (jobId: string) => {
      report('Resume failed', await runResumeCommand({ ...ctx(), jobId }), inspectTip);
    });

  program
    .command('retry')
    .description('Re-run a failed step, then the rest of the job')
    .argument('<job-id>', 'Job id')
    .argument('<step>', '0-based step index', parseNonNegativeInt)
    .action(async (jobId: string, stepIndex: number) => {
      report('Retry failed', await runRetryCommand({ ...ctx(), jobId, stepIndex }), inspectTip);
    });

  program
    .command('abort')
    .description('Abort a job; a running job stops at its next step')
    .argument('<job-id>', 'Job id')
    .option('--reason <text>', 'Recorded in the job metadata')
    .action(async (jobId: string, opts: { reason?: string }) => {
      report('Abort failed', await runAbortCommand({ ...ctx(), jobId, reason: opts.reason }));
    });

  // ── Observability ────────────────────────────────────────────────────────

  program
    .command('show')
    .description('Show a job and its steps')
    .argument('<job-id>', 'Job id')
    .option('--json', 'Print the raw job record')
    .action(async (jobId: string, opts: { json?: boolean }) => {
      report('Show failed', await runShowCommand({ ...ctx(), jobId, json: Boolean(opts.json) }));
    });

  program
    .command('list')
    .description('List recent jobs')
    .option('--limit <n>', 'Maximum number of jobs', parsePositiveInt, 10)
    .option('--status <status>', 'Only jobs in this status')
    .action(async (opts: { limit: number; status?: string }) => {
      report('List failed', await runListCommand({ ...ctx(), limit: opts.limit, status: opts.status }));
    });

  program
    .command('history')
    .description("Print a job's event ledger")
    .argument('<job-id>', 'Job id')
    .option('--tail <n>', 'Only the last n events', parsePositiveInt)
    .action(async (jobId: string, opts: { tail?: number }) => {
      report('History failed', await runHistoryCommand({ ...ctx(), jobId, tail: opts.tail }));
    });

  program
    .command('tools')
    .description('List the registered tools')
    .action(async () => {
      report('Tools failed', await runToolsCommand(ctx()));
    });

  await program.parseAsync(argv);
}

function inspectTip(res: CommandResult): string | undefined {
  return res.jobId ? `Inspect the job with: tasklane show ${res.jobId}` : 'Try running with --verbose for more details.';
}

function report(title: string, res: CommandResult, tip?: (res: CommandResult) => string | undefined): void {
  process.exitCode = res.exitCode;
  if (res.ok) return;
  const r = getRenderer();
  if (res.exitCode === EXIT_CANCELLED) {
    r.warn(res.details ?? 'Cancelled.');
    return;
  }
  r.error(title, res.details ?? 'unknown error', tip?.(res));
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
  return n;
}

const PackageVersion = z.object({ version: z.string() });

function detectVersionSync(): string | null {
  let current = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 8; i++) {
    const candidate = resolve(current, 'package.json');
    if (existsSync(candidate)) {
      try {
        const parsed = PackageVersion.safeParse(JSON.parse(readFileSync(candidate, 'utf8')));
        return parsed.success ? parsed.data.version : null;
      } catch {
        return null;
      }
    }
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  return null;
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected error', errorMessage(err), 'Try running with --verbose for more details.');
  process.exitCode = EXIT_UNEXPECTED;
});
