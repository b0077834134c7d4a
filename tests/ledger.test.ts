import { describe, expect, it } from 'vitest';
import { appendFile, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { LedgerReader } from '../src/core/ledger/reader.js';
import { LedgerWriter } from '../src/core/ledger/writer.js';

describe('ledger', () => {
  it('appends JSONL entries with monotonic seq and verifies integrity', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tasklane-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const writer = await LedgerWriter.open(ledgerPath);
    const e1 = await writer.append({ type: 'job_created', data: { jobId: 'j-20260301-0000abcd', task: 'demo' } });
    const e2 = await writer.append({ type: 'step_started', data: { stepIndex: 0, toolName: 'echo', attempt: 1 } });

    expect(e1.seq).toBe(1);
    expect(e2.seq).toBe(2);
    expect(e1.timestamp).toMatch(/Z$/);

    const reader = new LedgerReader(ledgerPath);
    expect((await reader.readAll()).map((e) => e.type)).toEqual(['job_created', 'step_started']);
    expect(await reader.verifyIntegrity()).toEqual({ ok: true });
  });

  it('continues the sequence across writers and past a torn last line', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tasklane-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    await (await LedgerWriter.open(ledgerPath)).append({ type: 'job_created', data: { jobId: 'x', task: 't' } });
    await appendFile(ledgerPath, '{"seq": 2, "timest', 'utf8');
    const next = await (await LedgerWriter.open(ledgerPath)).append({ type: 'job_aborted', data: {} });
    expect(next.seq).toBe(2);

    const { entries, warnings } = await new LedgerReader(ledgerPath).readAllSafe();
    expect(entries.map((e) => e.seq)).toEqual([1, 2]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^ledger parse failed at line 2: /);
  });

  it('detects sequence gaps', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tasklane-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    await writeFile(
      ledgerPath,
      `${JSON.stringify({ seq: 1, timestamp: new Date().toISOString(), type: 'job_created', data: { jobId: 'x', task: 't' } })}\n` +
        `${JSON.stringify({ seq: 3, timestamp: new Date().toISOString(), type: 'job_completed', data: {} })}\n`,
      'utf8'
    );

    const reader = new LedgerReader(ledgerPath);
    const res = await reader.verifyIntegrity();
    expect(res.ok).toBe(false);
    expect(res.message).toBe('Sequence gap at index 1 (expected seq=2, got 3)');
    expect((await reader.tail(1)).map((e) => e.type)).toEqual(['job_completed']);
  });

  it('reads a missing ledger as empty', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tasklane-ledger-'));
    expect(await new LedgerReader(join(dir, 'none.jsonl')).readAll()).toEqual([]);
  });
});
