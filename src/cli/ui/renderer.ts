import type { ExecutionOutcome } from '../../core/execution/engine.js';
import { countSteps } from '../../core/job/status.js';
import type { Job, Step, ToolResult } from '../../core/job/types.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import type { ToolCatalogEntry } from '../../core/tools/types.js';
import {
  drawBox,
  formatMs,
  formatTimestamp,
  keyValue,
  padRight,
  resultSummary,
  safeJson,
  sectionBanner,
  stepLine,
  truncate
} from './format.js';
import { noopSpinner, startSpinner, type SpinnerHandle } from './spinner.js';
import { INDENT, RULE_WIDTH, theme } from './theme.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI:
 * - InteractiveRenderer for TTY output (colors, spinners, boxes)
 * - QuietRenderer for machine-friendly JSON lines (--quiet)
 */
export interface Renderer {
  // ── Job flow ──
  section(name: string): void;
  jobCreated(jobId: string, task: string): void;
  memoryMatches(matches: string[]): void;
  planReady(job: Job): void;
  stepStart(step: Step, total: number): void;
  stepFinish(step: Step, result: ToolResult, total: number): void;
  jobFinished(job: Job, outcome: ExecutionOutcome): void;

  // ── Inspection ──
  jobDetails(job: Job): void;
  jobTable(jobs: Job[]): void;
  ledger(jobId: string, entries: LedgerEntry[], warnings: string[]): void;
  toolTable(tools: ToolCatalogEntry[]): void;

  // ── Messages ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;
  spinner(message: string): SpinnerHandle;
  text(message: string): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
}

export interface RendererOptions {
  /** Output sink; defaults to stderr so stdout stays clean for piping. */
  write?: (chunk: string) => void;
}

const defaultWrite = (chunk: string) => {
  process.stderr.write(chunk);
};

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private out: (chunk: string) => void;

  constructor(opts: RendererOptions = {}) {
    this.out = opts.write ?? defaultWrite;
  }

  private writeln(msg: string = ''): void {
    this.out(msg + '\n');
  }

  section(name: string): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner(name));
    this.writeln();
  }

  jobCreated(jobId: string, task: string): void {
    this.writeln(`${INDENT}Job ${theme.bold(jobId)}  ${theme.dim(truncate(task, 60))}`);
  }

  memoryMatches(matches: string[]): void {
    this.writeln(`${INDENT}${theme.dim(`Similar past tasks (${matches.length}):`)}`);
    matches.forEach((m, i) => {
      this.writeln(`${INDENT}  ${i + 1}. ${truncate(m.split('\n')[0] ?? '', 70)}`);
    });
  }

  planReady(job: Job): void {
    const lines = job.steps.map((s) => `${s.index + 1}. ${theme.bold(s.toolName)} ${theme.dim(truncate(safeJson(s.parameters, 0), 40))}`);
    this.writeln(drawBox(`Plan: ${job.steps.length} step${job.steps.length === 1 ? '' : 's'}`, lines, RULE_WIDTH));
    this.writeln();
  }

  stepStart(step: Step, total: number): void {
    const retry = step.retryCount > 0 ? theme.dim(` (retry ${step.retryCount})`) : '';
    this.writeln(`${INDENT}${theme.arrow} Step ${step.index + 1}/${total}: ${theme.bold(step.toolName)}${retry}`);
  }

  stepFinish(step: Step, result: ToolResult, _total: number): void {
    const timing = theme.dim(`(${formatMs(result.durationMs)})`);
    if (result.ok) {
      this.writeln(`${INDENT}${theme.check} ${step.toolName} ${timing}`);
    } else {
      this.writeln(`${INDENT}${theme.cross} ${step.toolName} ${timing}`);
      this.writeln(`${INDENT}  ${theme.error(resultSummary(result))}`);
    }
  }

  jobFinished(job: Job, outcome: ExecutionOutcome): void {
    const c = countSteps(job);
    this.writeln();
    if (outcome.ok) {
      this.writeln(`${INDENT}${theme.success(`Job ${job.id} completed`)} ${theme.dim(`(${c.succeeded}/${c.total} steps)`)}`);
    } else if (outcome.reason === 'aborted') {
      this.writeln(`${INDENT}${theme.warning(`Job ${job.id} stopped`)} ${theme.dim(`(${job.status})`)}`);
    } else {
      const at = outcome.stepIndex !== undefined ? ` at step ${outcome.stepIndex + 1}` : '';
      this.writeln(`${INDENT}${theme.error(`Job ${job.id} failed${at}`)}`);
      this.writeln(`${INDENT}${theme.dim('Tip:')} tasklane retry ${job.id} ${outcome.stepIndex ?? 0}  or  tasklane resume ${job.id}`);
    }
  }

  jobDetails(job: Job): void {
    this.writeln(`${INDENT}${theme.bold(`Job ${job.id}`)}`);
    this.writeln();
    this.writeln(keyValue('Task', job.task));
    this.writeln(keyValue('Status', theme.jobStatus(job.status)(job.status)));
    this.writeln(keyValue('Created', formatTimestamp(job.createdAt)));
    this.writeln(keyValue('Updated', formatTimestamp(job.updatedAt)));

    this.section('Steps');
    if (job.steps.length === 0) this.writeln(`${INDENT}${theme.dim('(no plan installed)')}`);
    for (const step of job.steps) {
      this.writeln(stepLine(step));
      if (step.result) this.writeln(`${INDENT}    ${theme.dim(resultSummary(step.result, 100))}`);
    }

    const artifacts = Object.entries(job.artifacts);
    if (artifacts.length) {
      this.section('Artifacts');
      for (const [name, ref] of artifacts) this.writeln(`${INDENT}${theme.bullet} ${name}: ${ref}`);
    }
    if (job.memoryContext.length) {
      this.section('Memory context');
      job.memoryContext.forEach((m, i) => this.writeln(`${INDENT}${i + 1}. ${truncate(m.split('\n')[0] ?? '', 70)}`));
    }
    const metadata = Object.keys(job.metadata);
    if (metadata.length) {
      this.section('Metadata');
      for (const key of metadata) this.writeln(keyValue(key, truncate(safeJson(job.metadata[key], 0), 60)));
    }
    this.writeln();
  }

  jobTable(jobs: Job[]): void {
    if (jobs.length === 0) {
      this.writeln(`${INDENT}${theme.dim('No jobs found.')}`);
      return;
    }
    this.writeln(`${INDENT}${theme.dim(`${padRight('ID', 22)}${padRight('STATUS', 11)}${padRight('STEPS', 7)}${padRight('UPDATED', 21)}TASK`)}`);
    for (const job of jobs) {
      const c = countSteps(job);
      const status = theme.jobStatus(job.status)(padRight(job.status, 11));
      this.writeln(
        `${INDENT}${padRight(job.id, 22)}${status}${padRight(`${c.succeeded}/${c.total}`, 7)}${padRight(formatTimestamp(job.updatedAt), 21)}${truncate(job.task, 40)}`
      );
    }
  }

  ledger(jobId: string, entries: LedgerEntry[], warnings: string[]): void {
    this.writeln(`${INDENT}${theme.bold(`Ledger for ${jobId}`)} ${theme.dim(`(${entries.length} events)`)}`);
    this.writeln();
    for (const e of entries) {
      this.writeln(`${INDENT}${theme.dim(String(e.seq).padStart(4))}  ${formatTimestamp(e.timestamp)}  ${padRight(e.type, 16)} ${theme.dim(truncate(safeJson(e.data, 0), 60))}`);
    }
    for (const w of warnings) this.warn(w);
  }

  toolTable(tools: ToolCatalogEntry[]): void {
    const width = Math.max(8, ...tools.map((t) => t.name.length)) + 2;
    for (const t of tools) this.writeln(`${INDENT}${theme.bold(padRight(t.name, width))}${theme.dim(t.description)}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) this.writeln(`${INDENT}${line}`);
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message, this.out);
  }

  text(message: string): void {
    this.writeln(message);
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private out: (chunk: string) => void;

  constructor(opts: RendererOptions = {}) {
    this.out = opts.write ?? defaultWrite;
  }

  private emit(type: string, data: Record<string, unknown> = {}): void {
    this.out(JSON.stringify({ type, timestamp: new Date().toISOString(), ...data }) + '\n');
  }

  section(): void { /* no-op in quiet mode */ }

  jobCreated(jobId: string, task: string): void {
    this.emit('job_created', { jobId, task });
  }

  memoryMatches(matches: string[]): void {
    this.emit('memory_matches', { matches });
  }

  planReady(job: Job): void {
    this.emit('plan_ready', { jobId: job.id, steps: job.steps.map((s) => ({ toolName: s.toolName, parameters: s.parameters })) });
  }

  stepStart(step: Step, total: number): void {
    this.emit('step_start', { stepIndex: step.index, toolName: step.toolName, total, retryCount: step.retryCount });
  }

  stepFinish(step: Step, result: ToolResult, total: number): void {
    this.emit('step_finish', { stepIndex: step.index, toolName: step.toolName, total, result });
  }

  jobFinished(job: Job, outcome: ExecutionOutcome): void {
    this.emit('job_finished', { jobId: job.id, status: job.status, outcome });
  }

  jobDetails(job: Job): void {
    this.emit('job', { job });
  }

  jobTable(jobs: Job[]): void {
    this.emit('jobs', {
      jobs: jobs.map((j) => ({ id: j.id, status: j.status, task: j.task, steps: j.steps.length, updatedAt: j.updatedAt }))
    });
  }

  ledger(jobId: string, entries: LedgerEntry[], warnings: string[]): void {
    this.emit('ledger', { jobId, entries, warnings });
  }

  toolTable(tools: ToolCatalogEntry[]): void {
    this.emit('tools', { tools });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, ...(tip ? { tip } : {}) });
  }

  warn(message: string): void {
    this.emit('warn', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return noopSpinner;
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/** The global Renderer; InteractiveRenderer until `createRenderer` or `setRenderer` says otherwise. */
export function getRenderer(): Renderer {
  if (!_instance) _instance = new InteractiveRenderer();
  return _instance;
}

/** Override the global Renderer (tests). */
export function setRenderer(renderer: Renderer | null): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
