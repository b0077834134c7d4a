import type { ArtifactMap, StepParameters } from '../job/types.js';

export interface InvocationContext {
  /** Aborted when the call times out or the caller cancels; honoring it is up to the capability. */
  signal: AbortSignal;
  jobId?: string;
  stepIndex?: number;
  /** Artifacts produced by earlier steps of the same job. */
  artifacts: Readonly<ArtifactMap>;
  /** Publish an artifact; it is merged into the job only if the call succeeds. */
  addArtifact(name: string, ref: string): void;
}

/**
 * One invocable action. Whatever `invoke` returns becomes the step payload; whatever it
 * throws becomes a `ToolExecutionError` result.
 */
export interface Capability {
  invoke(parameters: StepParameters, context: InvocationContext): unknown;
}

export interface ToolDescriptor {
  name: string;
  capability: Capability;
  description: string;
}

/** The part of a descriptor the planner sees. */
export interface ToolCatalogEntry {
  name: string;
  description: string;
}

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ExecuteOptions {
  /** Per-call bound; `0` or absent means unbounded. Capped at `MAX_TIMER_DELAY_MS`. */
  timeoutMs?: number;
  signal?: AbortSignal;
  jobId?: string;
  stepIndex?: number;
  artifacts?: ArtifactMap;
}

export function capability(invoke: Capability['invoke']): Capability {
  return { invoke };
}
