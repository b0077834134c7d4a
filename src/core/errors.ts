export type ErrorCode =
  | 'TOOL_NOT_FOUND'
  | 'DUPLICATE_TOOL'
  | 'TOOL_EXECUTION_ERROR'
  | 'TOOL_TIMEOUT'
  | 'PLANNING_ERROR'
  | 'JOB_NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'JOB_BUSY'
  | 'PERSISTENCE_ERROR';

/**
 * Base class for every error the engine raises to its callers.
 * `code` is stable and is what the CLI maps to exit codes.
 */
export class TasklaneError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ToolNotFoundError extends TasklaneError {
  constructor(readonly toolName: string) {
    super('TOOL_NOT_FOUND', `Tool '${toolName}' is not registered`);
  }
}

export class DuplicateToolError extends TasklaneError {
  constructor(readonly toolName: string) {
    super('DUPLICATE_TOOL', `Tool '${toolName}' is already registered (pass overwrite to replace it)`);
  }
}

export class PlanningError extends TasklaneError {
  readonly issues: string[];

  constructor(message: string, options?: { cause?: unknown; issues?: string[] }) {
    super('PLANNING_ERROR', message, options);
    this.issues = options?.issues ?? [];
  }
}

export class JobNotFoundError extends TasklaneError {
  constructor(readonly jobId: string) {
    super('JOB_NOT_FOUND', `Job '${jobId}' not found`);
  }
}

export class InvalidStateTransitionError extends TasklaneError {
  constructor(
    readonly jobId: string,
    readonly from: string,
    readonly operation: string,
    detail?: string
  ) {
    super(
      'INVALID_STATE_TRANSITION',
      `Cannot ${operation} job '${jobId}' in state '${from}'${detail ? `: ${detail}` : ''}`
    );
  }
}

export class JobBusyError extends TasklaneError {
  constructor(
    readonly jobId: string,
    readonly holderPid?: number,
    activity: 'executed' | 'updated' = 'executed'
  ) {
    super(
      'JOB_BUSY',
      holderPid !== undefined
        ? `Job '${jobId}' is already being ${activity} (pid ${holderPid})`
        : `Job '${jobId}' is already being ${activity}`
    );
  }
}

export class PersistenceError extends TasklaneError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_ERROR', message, options);
  }
}

export function isTasklaneError(err: unknown): err is TasklaneError {
  return err instanceof TasklaneError;
}
