import { describe, expect, it } from 'vitest';

import { PlanningError } from '../src/core/errors.js';
import { buildPlannerPrompt } from '../src/core/planner/prompt.js';
import { parsePlan, parsePlanText } from '../src/core/planner/schema.js';

describe('parsePlan', () => {
  it('accepts a bare array or a steps wrapper and defaults parameters', () => {
    const expected = [
      { toolName: 'read_file', parameters: { path: 'a.txt' } },
      { toolName: 'echo', parameters: {} }
    ];
    const entries = [{ toolName: ' read_file ', parameters: { path: 'a.txt' } }, { toolName: 'echo' }];

    expect(parsePlan(entries)).toEqual(expected);
    expect(parsePlan({ steps: entries })).toEqual(expected);
  });

  it('rejects empty plans, unknown keys and non-object parameters', () => {
    expect(() => parsePlan([])).toThrow(
      'Planner output does not match the plan schema: (plan): plan must contain at least one step'
    );
    expect(() => parsePlan([{ toolName: 'echo', tool: 'x' }])).toThrow(PlanningError);
    expect(() => parsePlan([{ toolName: 'echo', parameters: [1, 2] }])).toThrow(PlanningError);
    expect(() => parsePlan({ steps: [{ toolName: 'echo' }], notes: 'extra' })).toThrow(PlanningError);
  });

  it('lists every offending entry in the error', () => {
    try {
      parsePlan([{ toolName: '' }, { parameters: {} }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PlanningError);
      if (!(err instanceof PlanningError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toBe('0.toolName: toolName must be a non-empty string');
      expect(err.issues[1]).toMatch(/^1\.toolName: /);
    }
  });

  it('enforces the step limit', () => {
    const plan = Array.from({ length: 4 }, () => ({ toolName: 'echo' }));
    expect(parsePlan(plan, { maxSteps: 4 })).toHaveLength(4);
    expect(() => parsePlan(plan, { maxSteps: 3 })).toThrow('(plan): plan must not exceed 3 steps');
  });
});

describe('parsePlanText', () => {
  it('reads JSON, optionally inside a code fence', () => {
    const text = '```json\n{"steps": [{"toolName": "echo", "parameters": {"x": 1}}]}\n```';
    expect(parsePlanText(text)).toEqual([{ toolName: 'echo', parameters: { x: 1 } }]);
    expect(parsePlanText('[{"toolName": "echo"}]\n')).toEqual([{ toolName: 'echo', parameters: {} }]);
  });

  it('fails on empty or non-JSON output', () => {
    expect(() => parsePlanText('  \n')).toThrow('Planner returned no output');
    expect(() => parsePlanText('Sure! Here is the plan.')).toThrow(/^Planner output is not valid JSON: /);
  });
});

describe('buildPlannerPrompt', () => {
  it('lists tools and past tasks and ends with the task', () => {
    const prompt = buildPlannerPrompt({
      task: 'count lines in notes.txt',
      memoryContext: ['Task: count words\nPlan: read_file\nOutcome: completed'],
      toolCatalog: [
        { name: 'echo', description: 'Return the parameters' },
        { name: 'read_file', description: 'Read a file' }
      ]
    });
    const lines = prompt.split('\n');

    expect(lines).toContain('- echo: Return the parameters');
    expect(lines).toContain('- read_file: Read a file');
    expect(lines).toContain('1. Task: count words');
    expect(lines[lines.length - 1]).toBe('Task: count lines in notes.txt');
  });

  it('marks an empty catalog and memory', () => {
    const lines = buildPlannerPrompt({ task: 't', memoryContext: [], toolCatalog: [] }).split('\n');
    expect(lines).toContain('- (no tools registered)');
    expect(lines).toContain('(none)');
  });
});
