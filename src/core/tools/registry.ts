import { errorMessage } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { DuplicateToolError, ToolNotFoundError } from '../errors.js';
import type { ArtifactMap, StepParameters, ToolErrorKind, ToolResult, ToolSuccess } from '../job/types.js';
import {
  MAX_TIMER_DELAY_MS,
  type Capability,
  type ExecuteOptions,
  type InvocationContext,
  type ToolCatalogEntry,
  type ToolDescriptor
} from './types.js';

type Settled =
  | { kind: 'value'; value: unknown }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'cancelled' };

/**
 * Name → capability dispatch table.
 *
 * `execute` is the only entry point the engine uses and it never throws: every outcome,
 * including a missing tool, a throwing capability or a timeout, comes back as a `ToolResult`.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDescriptor>();

  constructor(private logger?: Logger) {}

  register(name: string, capability: Capability, description: string, overwrite = false): void {
    if (!name.trim()) throw new Error('Tool name must be a non-empty string');
    if (this.tools.has(name) && !overwrite) throw new DuplicateToolError(name);
    this.tools.set(name, { name, capability, description });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Capability {
    const entry = this.tools.get(name);
    if (!entry) throw new ToolNotFoundError(name);
    return entry.capability;
  }

  get size(): number {
    return this.tools.size;
  }

  /** Descriptors ordered by name, so planner prompts are reproducible for a given registry. */
  list(): ToolDescriptor[] {
    return [...this.tools.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  catalog(): ToolCatalogEntry[] {
    return this.list().map(({ name, description }) => ({ name, description }));
  }

  describe(): string {
    return this.catalog()
      .map((t) => `- ${t.name}: ${t.description}`)
      .join('\n');
  }

  clear(): void {
    this.tools.clear();
  }

  async execute(name: string, parameters: StepParameters, options: ExecuteOptions = {}): Promise<ToolResult> {
    const startedAt = Date.now();
    const entry = this.tools.get(name);
    if (!entry) {
      return this.fail(name, startedAt, 'ToolNotFound', `Tool '${name}' is not registered`);
    }
    if (options.signal?.aborted) {
      return this.fail(name, startedAt, 'ToolExecutionError', 'cancelled');
    }

    const controller = new AbortController();
    const produced: ArtifactMap = {};
    const context: InvocationContext = {
      signal: controller.signal,
      jobId: options.jobId,
      stepIndex: options.stepIndex,
      artifacts: Object.freeze({ ...options.artifacts }),
      addArtifact(artifactName: string, ref: string) {
        if (!artifactName.trim()) throw new Error('Artifact name must be a non-empty string');
        produced[artifactName] = ref;
      }
    };

    this.logger?.debug('tool invoked', { tool: name, jobId: options.jobId, stepIndex: options.stepIndex });

    // Capabilities may throw synchronously; starting inside a promise chain normalizes that.
    const invocation: Promise<Settled> = Promise.resolve()
      .then(() => entry.capability.invoke(parameters, context))
      .then(
        (value): Settled => ({ kind: 'value', value }),
        (error: unknown): Settled => ({ kind: 'error', error })
      );

    const contenders: Array<Promise<Settled>> = [invocation];
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const timeoutMs = Math.min(options.timeoutMs ?? 0, MAX_TIMER_DELAY_MS);
    if (timeoutMs > 0) {
      contenders.push(
        new Promise<Settled>((resolve) => {
          timer = setTimeout(() => resolve({ kind: 'timeout', timeoutMs }), timeoutMs);
        })
      );
    }
    const callerSignal = options.signal;
    if (callerSignal) {
      contenders.push(
        new Promise<Settled>((resolve) => {
          onCallerAbort = () => resolve({ kind: 'cancelled' });
          callerSignal.addEventListener('abort', onCallerAbort, { once: true });
        })
      );
    }

    let outcome: Settled;
    try {
      outcome = await Promise.race(contenders);
    } finally {
      if (timer) clearTimeout(timer);
      if (callerSignal && onCallerAbort) callerSignal.removeEventListener('abort', onCallerAbort);
    }

    switch (outcome.kind) {
      case 'value': {
        const result: ToolSuccess = {
          ok: true,
          payload: toJsonSafe(outcome.value),
          durationMs: Date.now() - startedAt
        };
        if (Object.keys(produced).length > 0) result.artifacts = { ...produced };
        this.logger?.debug('tool succeeded', { tool: name, durationMs: result.durationMs });
        return result;
      }
      case 'error':
        return this.fail(name, startedAt, 'ToolExecutionError', errorMessage(outcome.error));
      case 'timeout':
        controller.abort(new Error(`timed out after ${outcome.timeoutMs}ms`));
        this.abandon(name, invocation);
        return this.fail(name, startedAt, 'ToolTimeout', `Tool '${name}' timed out after ${outcome.timeoutMs}ms`);
      case 'cancelled':
        controller.abort(new Error('cancelled'));
        this.abandon(name, invocation);
        return this.fail(name, startedAt, 'ToolExecutionError', 'cancelled');
    }
  }

  private fail(name: string, startedAt: number, kind: ToolErrorKind, message: string): ToolResult {
    const durationMs = Date.now() - startedAt;
    this.logger?.warn('tool failed', { tool: name, kind, message, durationMs });
    return { ok: false, error: { kind, message }, durationMs };
  }

  // The abandoned call keeps running until it settles; its side effects are not undone.
  private abandon(name: string, invocation: Promise<Settled>): void {
    void invocation.then((late) => {
      this.logger?.debug('abandoned tool call settled', { tool: name, outcome: late.kind });
    });
  }
}

/**
 * Payloads are persisted in the job record, so they are reduced to what JSON can carry.
 * Values JSON cannot represent (cycles, bigint) fall back to their string form.
 */
export function toJsonSafe(value: unknown): unknown {
  if (value === undefined) return null;
  try {
    const text = JSON.stringify(value);
    return text === undefined ? null : JSON.parse(text);
  } catch {
    return String(value);
  }
}
