import chalk, { type ChalkInstance } from 'chalk';

import type { JobStatus, StepStatus } from '../../core/job/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,

  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan
  },

  jobStatus: (status: JobStatus): ChalkInstance => {
    const map: Record<JobStatus, ChalkInstance> = {
      pending: chalk.dim,
      planning: chalk.blue,
      running: chalk.yellow,
      completed: chalk.green,
      failed: chalk.red,
      aborted: chalk.magenta
    };
    return map[status];
  },

  stepIcon: (status: StepStatus): string => {
    const map: Record<StepStatus, string> = {
      pending: chalk.dim('○'),
      running: chalk.yellow('◐'),
      succeeded: chalk.green('✔'),
      failed: chalk.red('✖'),
      skipped: chalk.dim('–')
    };
    return map[status];
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 64;
