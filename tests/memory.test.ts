import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import type { Job } from '../src/core/job/types.js';
import { JsonlMemoryStore, summarizeJob, tokenize } from '../src/core/memory/jsonl-store.js';
import { tempDir } from './fixtures.js';

describe('tokenize', () => {
  it('lowercases, splits on non-alphanumerics and drops one-letter tokens', () => {
    expect([...tokenize('Write a README.md, then commit!')]).toEqual(['write', 'readme', 'md', 'then', 'commit']);
  });

  it('keeps letters and digits of any script', () => {
    expect([...tokenize('Übersetze die Datei café_2.txt')]).toEqual(['übersetze', 'die', 'datei', 'café', 'txt']);
    expect([...tokenize('整理 笔记')]).toEqual(['整理', '笔记']);
  });
});

describe('summarizeJob', () => {
  it('describes the task, the tools in order and the outcome', () => {
    const base: Omit<Job, 'steps'> = {
      id: 'j-20260301-00000001',
      task: 'tidy notes',
      status: 'completed',
      memoryContext: [],
      artifacts: {},
      metadata: {},
      createdAt: '2026-03-01T00:00:00.000Z',
      updatedAt: '2026-03-01T00:00:00.000Z'
    };
    const step = (index: number, toolName: string) => ({
      index,
      toolName,
      parameters: {},
      status: 'succeeded' as const,
      result: null,
      retryCount: 0,
      startedAt: null,
      endedAt: null
    });

    expect(summarizeJob({ ...base, steps: [step(0, 'read_file'), step(1, 'write_file')] })).toBe(
      'Task: tidy notes\nPlan: read_file -> write_file\nOutcome: completed'
    );
    expect(summarizeJob({ ...base, status: 'failed', steps: [] })).toBe('Task: tidy notes\nPlan: (no plan)\nOutcome: failed');
  });
});

describe('JsonlMemoryStore', () => {
  it('ranks by shared words, newest first on ties', async () => {
    const store = new JsonlMemoryStore(join(await tempDir('tasklane-memory-'), 'memory.jsonl'));
    await store.record({ jobId: 'j-20260301-00000001', task: 'write release notes', status: 'completed', summary: 'one' });
    await store.record({ jobId: 'j-20260301-00000002', task: 'deploy the site', status: 'failed', summary: 'two' });
    await store.record({ jobId: 'j-20260301-00000003', task: 'write notes for the site', status: 'completed', summary: 'three' });
    await store.record({ jobId: 'j-20260301-00000004', task: 'release the site', status: 'completed', summary: 'four' });

    expect(await store.search('write site release notes', 10)).toEqual(['three', 'one', 'four', 'two']);
    expect(await store.search('write site release notes', 2)).toEqual(['three', 'one']);
    expect(await store.search('unrelated query', 5)).toEqual([]);
    expect(await store.search('site', 0)).toEqual([]);
  });

  it('matches tasks written in other languages', async () => {
    const store = new JsonlMemoryStore(join(await tempDir('tasklane-memory-'), 'memory.jsonl'));
    await store.record({ jobId: 'j-20260301-00000001', task: 'Übersetze die Notizen', status: 'completed', summary: 'de' });
    await store.record({ jobId: 'j-20260301-00000002', task: 'deploy the site', status: 'completed', summary: 'en' });

    expect(await store.search('übersetze das Handbuch', 3)).toEqual(['de']);
  });

  it('skips malformed lines', async () => {
    const path = join(await tempDir('tasklane-memory-'), 'memory.jsonl');
    const store = new JsonlMemoryStore(path);
    await store.record({ jobId: 'j-20260301-00000001', task: 'count lines', status: 'completed', summary: 'kept' });
    await appendFile(path, 'not json\n{"jobId": 1}\n', 'utf8');

    expect(await store.readAll()).toHaveLength(1);
    expect(await store.search('count', 3)).toEqual(['kept']);
  });

  it('reads a missing file as empty', async () => {
    const store = new JsonlMemoryStore(join(await tempDir('tasklane-memory-'), 'none', 'memory.jsonl'));
    expect(await store.search('anything', 3)).toEqual([]);
  });
});
