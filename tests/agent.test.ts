import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  JobManager,
  JsonlMemoryStore,
  Logger,
  PersistenceError,
  PlanningError,
  runTask,
  type MemoryStore
} from '../src/index.js';
import { createTestRegistry, ScriptedPlanner, tempDir } from './fixtures.js';

async function setup() {
  const dir = await tempDir('tasklane-agent-');
  const { registry, calls } = createTestRegistry();
  const manager = new JobManager(join(dir, 'state'), registry);
  const memory = new JsonlMemoryStore(join(dir, 'state', 'memory.jsonl'));
  return { manager, memory, calls };
}

describe('runTask', () => {
  it('creates, plans, executes and remembers a task', async () => {
    const { manager, memory, calls } = await setup();
    await memory.record({ jobId: 'j-20260301-00000001', task: 'say hello', status: 'completed', summary: 'earlier hello' });
    const planner = new ScriptedPlanner([{ toolName: 'echo', parameters: { text: 'hi' } }]);
    const events: string[] = [];

    const { jobId, outcome } = await runTask('say hi', {
      manager,
      planner,
      memory,
      hooks: {
        onJobCreated: () => events.push('created'),
        onMemory: ({ matches }) => events.push(`memory:${matches.length}`),
        onPlanningStart: () => events.push('planning'),
        onPlanReady: ({ plan }) => events.push(`ready:${plan.length}`),
        onStepFinish: ({ step }) => events.push(`step:${step.index}:${step.status}`),
        onJobFinish: ({ job }) => events.push(`job:${job.status}`)
      }
    });

    expect(outcome).toEqual({ ok: true, status: 'completed' });
    expect(events).toEqual(['created', 'memory:1', 'planning', 'ready:1', 'step:0:succeeded', 'job:completed']);
    expect(calls).toEqual([{ tool: 'echo', stepIndex: 0, parameters: { text: 'hi' } }]);

    expect(planner.requests).toHaveLength(1);
    expect(planner.requests[0].task).toBe('say hi');
    expect(planner.requests[0].memoryContext).toEqual(['earlier hello']);
    expect(planner.requests[0].toolCatalog.map((t) => t.name)).toEqual(['artifact', 'echo', 'fail', 'flaky', 'peek']);

    const job = await manager.getJob(jobId);
    expect(job.memoryContext).toEqual(['earlier hello']);
    const remembered = await memory.readAll();
    expect(remembered).toHaveLength(2);
    expect(remembered[1]).toMatchObject({
      jobId,
      task: 'say hi',
      status: 'completed',
      summary: 'Task: say hi\nPlan: echo\nOutcome: completed'
    });
  });

  it('fails the job when the planner throws', async () => {
    const { manager, memory } = await setup();
    const { jobId, outcome } = await runTask('plan me', {
      manager,
      planner: new ScriptedPlanner(new Error('model offline')),
      memory
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok || outcome.reason !== 'planning') throw new Error(`unexpected outcome ${JSON.stringify(outcome)}`);
    expect(outcome.error).toBeInstanceOf(PlanningError);
    expect(outcome.error.message).toBe('model offline');

    const job = await manager.getJob(jobId);
    expect(job).toMatchObject({ status: 'failed', steps: [], metadata: { planningError: 'model offline' } });
    expect((await memory.readAll()).map((r) => r.status)).toEqual(['failed']);
  });

  it('fails the job when the plan does not validate', async () => {
    const { manager } = await setup();
    const { jobId, outcome } = await runTask('empty plan', { manager, planner: new ScriptedPlanner([]) });

    expect(outcome).toMatchObject({ ok: false, reason: 'planning' });
    expect((await manager.getJob(jobId)).status).toBe('failed');
  });

  it('reports an abort that arrives while planning', async () => {
    const { manager, calls } = await setup();
    const planner = new ScriptedPlanner(async () => {
      const [job] = await manager.listJobs(1);
      await manager.abort(job.id, 'changed my mind');
      return [{ toolName: 'echo', parameters: {} }];
    });

    const { jobId, outcome } = await runTask('never mind', { manager, planner });
    expect(outcome).toEqual({ ok: false, reason: 'aborted' });
    expect((await manager.getJob(jobId)).status).toBe('aborted');
    expect(calls).toHaveLength(0);
  });

  it('plans without memory context when the memory store cannot be searched', async () => {
    const { manager } = await setup();
    const memory: MemoryStore = {
      search: async () => {
        throw new PersistenceError('memory.jsonl is unreadable');
      },
      record: async (entry) => ({ ...entry, recordedAt: '2026-03-01T00:00:00.000Z' })
    };
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', json: true, write: (line) => lines.push(line) });
    const planner = new ScriptedPlanner([{ toolName: 'echo', parameters: {} }]);

    const { jobId, outcome } = await runTask('offline memory', { manager, planner, memory, logger });

    expect(outcome).toEqual({ ok: true, status: 'completed' });
    expect(planner.requests[0].memoryContext).toEqual([]);
    expect((await manager.getJob(jobId)).memoryContext).toEqual([]);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'warn',
      message: 'could not search memory',
      data: { jobId, error: 'memory.jsonl is unreadable' }
    });
  });

  it('runs without memory', async () => {
    const { manager } = await setup();
    const { outcome } = await runTask('no memory', {
      manager,
      planner: new ScriptedPlanner([{ toolName: 'fail', parameters: { message: 'nope' } }])
    });
    expect(outcome).toEqual({ ok: false, reason: 'failed', stepIndex: 0 });
  });
});
