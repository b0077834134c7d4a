import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { JobNotFoundError, PersistenceError } from '../src/core/errors.js';
import { JobStore } from '../src/core/job/store.js';
import type { Job } from '../src/core/job/types.js';
import { Logger } from '../src/utils/logger.js';
import { tempDir } from './fixtures.js';

function sampleJob(id: string): Job {
  return {
    id,
    task: 'sample',
    status: 'running',
    steps: [
      {
        index: 0,
        toolName: 'echo',
        parameters: { text: 'hi' },
        status: 'succeeded',
        result: { ok: true, payload: { text: 'hi' }, durationMs: 3 },
        retryCount: 0,
        startedAt: '2026-03-01T00:00:01.000Z',
        endedAt: '2026-03-01T00:00:02.000Z'
      }
    ],
    memoryContext: [],
    artifacts: { out: 'out.txt' },
    metadata: {},
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:02.000Z'
  };
}

describe('JobStore', () => {
  it('round-trips a record and leaves no staging files behind', async () => {
    const store = new JobStore(await tempDir('tasklane-store-'));
    const job = sampleJob('j-20260301-00000001');
    await store.write(job);

    expect(await store.read(job.id)).toEqual(job);
    expect(await readdir(store.paths(job.id).jobDir)).toEqual(['job.json']);
    expect(await store.exists(job.id)).toBe(true);
    expect(await store.exists('j-20260301-00000002')).toBe(false);
  });

  it('raises PersistenceError for corrupt or invalid records', async () => {
    const store = new JobStore(await tempDir('tasklane-store-'));
    const broken = 'j-20260301-0000000b';
    const invalid = 'j-20260301-0000000c';
    await mkdir(store.paths(broken).jobDir, { recursive: true });
    await writeFile(store.paths(broken).recordPath, '{"id": ', 'utf8');
    await mkdir(store.paths(invalid).jobDir, { recursive: true });
    await writeFile(store.paths(invalid).recordPath, JSON.stringify({ ...sampleJob(invalid), status: 'paused' }), 'utf8');

    await expect(store.read(broken)).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.read(invalid)).rejects.toThrow(`Job record '${invalid}' failed validation: status: `);
  });

  it('never touches the filesystem for malformed ids', async () => {
    const store = new JobStore(await tempDir('tasklane-store-'));
    await expect(store.read('../../etc/passwd')).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('lists readable records and skips the rest with a warning', async () => {
    const lines: string[] = [];
    const store = new JobStore(await tempDir('tasklane-store-'), new Logger({ level: 'warn', json: true, write: (l) => lines.push(l) }));
    await store.write(sampleJob('j-20260301-00000002'));
    await store.write(sampleJob('j-20260301-00000001'));
    await mkdir(store.paths('j-20260301-00000003').jobDir, { recursive: true });
    await mkdir(join(store.jobsDir, 'not-a-job'), { recursive: true });

    expect(await store.listIds()).toEqual(['j-20260301-00000001', 'j-20260301-00000002', 'j-20260301-00000003']);
    expect((await store.readAll()).map((j) => j.id)).toEqual(['j-20260301-00000001', 'j-20260301-00000002']);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'skipping unreadable job record' });
  });

  it('lists nothing before the first job exists', async () => {
    expect(await new JobStore(join(await tempDir('tasklane-store-'), 'fresh')).readAll()).toEqual([]);
  });
});
