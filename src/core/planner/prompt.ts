import type { PlanRequest } from './types.js';

/**
 * Prompt for a text-completion planner. The catalog comes from `ToolRegistry.catalog()`, which is
 * name-ordered, so the same registry and task always yield the same prompt.
 */
export function buildPlannerPrompt(request: PlanRequest): string {
  const tools = request.toolCatalog.length
    ? request.toolCatalog.map((t) => `- ${t.name}: ${t.description}`).join('\n')
    : '- (no tools registered)';

  const memory = request.memoryContext.length
    ? request.memoryContext.map((m, i) => `${i + 1}. ${m}`).join('\n')
    : '(none)';

  return [
    'You are a planning assistant. Break the task below into an ordered list of tool calls.',
    '',
    'Available tools:',
    tools,
    '',
    'Relevant past tasks:',
    memory,
    '',
    'Respond with JSON only, no prose, in exactly this shape:',
    '{"steps": [{"toolName": "<one of the tools above>", "parameters": {"<name>": <value>}}]}',
    'Steps run in order and a later step may read files written by an earlier one.',
    '',
    `Task: ${request.task}`
  ].join('\n');
}
