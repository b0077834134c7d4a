import type { PlanEntry } from '../job/types.js';
import type { ToolCatalogEntry } from '../tools/types.js';

export interface PlanRequest {
  task: string;
  memoryContext: string[];
  toolCatalog: ToolCatalogEntry[];
}

/**
 * Turns a task into an ordered list of tool calls. Implementations throw `PlanningError`
 * when they cannot produce a plan that passes `parsePlan`.
 */
export interface PlannerGateway {
  plan(request: PlanRequest, options?: { signal?: AbortSignal }): Promise<PlanEntry[]>;
}
