import { z } from 'zod';

import { errorMessage } from '../../utils/fs.js';
import { PlanningError } from '../errors.js';
import { StepParameters, type PlanEntry } from '../job/types.js';

export const DEFAULT_MAX_PLAN_STEPS = 25;

export const PlanEntrySchema = z
  .object({
    toolName: z.string().trim().min(1, 'toolName must be a non-empty string'),
    parameters: StepParameters.default({})
  })
  .strict();

/**
 * Validate planner output. Accepted shapes are a bare array of entries or `{ "steps": [...] }`;
 * unknown keys, missing tool names and non-object parameters are rejected, never coerced.
 */
export function parsePlan(raw: unknown, opts: { maxSteps?: number } = {}): PlanEntry[] {
  const maxSteps = opts.maxSteps ?? DEFAULT_MAX_PLAN_STEPS;
  const PlanSchema = z
    .array(PlanEntrySchema)
    .min(1, 'plan must contain at least one step')
    .max(maxSteps, `plan must not exceed ${maxSteps} steps`);

  const candidate = unwrapSteps(raw);
  const res = PlanSchema.safeParse(candidate);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(plan)'}: ${i.message}`);
    throw new PlanningError(`Planner output does not match the plan schema: ${issues.join('; ')}`, { issues });
  }
  return res.data.map((e) => ({ toolName: e.toolName, parameters: e.parameters }));
}

/** Parse planner text as JSON, allowing the plan to be wrapped in a single fenced code block. */
export function parsePlanText(text: string, opts: { maxSteps?: number } = {}): PlanEntry[] {
  const body = stripCodeFence(text.trim());
  if (!body) throw new PlanningError('Planner returned no output');

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new PlanningError(`Planner output is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return parsePlan(raw, opts);
}

function unwrapSteps(raw: unknown): unknown {
  if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
    const keys = Object.keys(raw);
    if (keys.length === 1 && keys[0] === 'steps' && 'steps' in raw) return raw.steps;
  }
  return raw;
}

function stripCodeFence(text: string): string {
  const m = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/.exec(text);
  return m ? m[1].trim() : text;
}
