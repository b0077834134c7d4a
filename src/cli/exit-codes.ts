import type { ErrorCode } from '../core/errors.js';
import { isTasklaneError } from '../core/errors.js';
import type { RunTaskOutcome } from '../core/agent.js';

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_JOB_FAILED = 2;
export const EXIT_CANCELLED = 130;

const CODE_EXIT: Record<ErrorCode, number> = {
  JOB_NOT_FOUND: 3,
  INVALID_STATE_TRANSITION: 4,
  JOB_BUSY: 5,
  PLANNING_ERROR: 6,
  PERSISTENCE_ERROR: 7,
  TOOL_NOT_FOUND: 8,
  DUPLICATE_TOOL: 8,
  // Tool-level kinds end up in step results, never as thrown errors.
  TOOL_EXECUTION_ERROR: EXIT_JOB_FAILED,
  TOOL_TIMEOUT: EXIT_JOB_FAILED
};

export function exitCodeForError(err: unknown): number {
  return isTasklaneError(err) ? CODE_EXIT[err.code] : EXIT_UNEXPECTED;
}

export function exitCodeForOutcome(outcome: RunTaskOutcome): number {
  if (outcome.ok) return EXIT_OK;
  switch (outcome.reason) {
    case 'failed':
      return EXIT_JOB_FAILED;
    case 'aborted':
      return EXIT_CANCELLED;
    case 'planning':
      return CODE_EXIT.PLANNING_ERROR;
  }
}
