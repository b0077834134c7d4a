import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { JobIdGenerator } from '../src/utils/id.js';
import type { PlanEntry } from '../src/core/job/types.js';
import type { PlannerGateway, PlanRequest } from '../src/core/planner/types.js';
import { ToolRegistry } from '../src/core/tools/registry.js';
import { capability } from '../src/core/tools/types.js';

export async function tempDir(prefix = 'tasklane-'): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export interface ToolCall {
  tool: string;
  stepIndex?: number;
  parameters: Record<string, unknown>;
}

/**
 * Registry with small deterministic tools:
 * - `echo` returns its parameters
 * - `fail` throws `parameters.message` (default "boom")
 * - `flaky` throws until it has been called more than `parameters.failTimes` times for the same step
 * - `artifact` publishes `parameters.name` → `parameters.ref`
 * - `peek` returns the artifacts of earlier steps
 */
export function createTestRegistry(): { registry: ToolRegistry; calls: ToolCall[] } {
  const registry = new ToolRegistry();
  const calls: ToolCall[] = [];
  const attempts = new Map<string, number>();

  registry.register(
    'echo',
    capability((parameters, ctx) => {
      calls.push({ tool: 'echo', stepIndex: ctx.stepIndex, parameters });
      return parameters;
    }),
    'Return the parameters'
  );
  registry.register(
    'fail',
    capability((parameters, ctx) => {
      calls.push({ tool: 'fail', stepIndex: ctx.stepIndex, parameters });
      throw new Error(typeof parameters.message === 'string' ? parameters.message : 'boom');
    }),
    'Always throw'
  );
  registry.register(
    'flaky',
    capability((parameters, ctx) => {
      calls.push({ tool: 'flaky', stepIndex: ctx.stepIndex, parameters });
      const key = `${ctx.jobId}:${ctx.stepIndex}`;
      const n = (attempts.get(key) ?? 0) + 1;
      attempts.set(key, n);
      const failTimes = typeof parameters.failTimes === 'number' ? parameters.failTimes : 1;
      if (n <= failTimes) throw new Error(`attempt ${n} failed`);
      return { attempt: n };
    }),
    'Fail the first few attempts'
  );
  registry.register(
    'artifact',
    capability((parameters, ctx) => {
      calls.push({ tool: 'artifact', stepIndex: ctx.stepIndex, parameters });
      ctx.addArtifact(String(parameters.name), String(parameters.ref));
      return { published: parameters.name };
    }),
    'Publish an artifact'
  );
  registry.register(
    'peek',
    capability((parameters, ctx) => {
      calls.push({ tool: 'peek', stepIndex: ctx.stepIndex, parameters });
      return { ...ctx.artifacts };
    }),
    'Return the artifacts seen so far'
  );

  return { registry, calls };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Job ids with the given suffixes, in order; the date part comes from the clock passed to `next`. */
export function fixedIds(...suffixes: string[]): JobIdGenerator {
  const queue = [...suffixes];
  return new JobIdGenerator(() => {
    const next = queue.shift();
    if (!next) throw new Error('fixedIds: out of ids');
    return next;
  });
}

/** Clock that moves one second forward on every read. */
export function steppingClock(startIso = '2026-03-01T00:00:00.000Z'): () => Date {
  let t = Date.parse(startIso);
  return () => {
    t += 1000;
    return new Date(t);
  };
}

/** Planner that returns a fixed plan (or throws) and records what it was asked. */
export class ScriptedPlanner implements PlannerGateway {
  readonly requests: PlanRequest[] = [];

  constructor(private script: PlanEntry[] | Error | ((request: PlanRequest) => Promise<PlanEntry[]>)) {}

  async plan(request: PlanRequest): Promise<PlanEntry[]> {
    this.requests.push(request);
    if (this.script instanceof Error) throw this.script;
    if (typeof this.script === 'function') return await this.script(request);
    return this.script;
  }
}
