import { describe, expect, it } from 'vitest';

import { exitCodeForError, exitCodeForOutcome } from '../src/cli/exit-codes.js';
import { formatMs, formatTimestamp, padRight, stripAnsi, truncate } from '../src/cli/ui/format.js';
import { InteractiveRenderer } from '../src/cli/ui/renderer.js';
import type { Job } from '../src/core/job/types.js';
import { JobBusyError, PlanningError, ToolNotFoundError } from '../src/core/errors.js';

describe('format helpers', () => {
  it('formats durations compactly', () => {
    expect(formatMs(124.4)).toBe('124ms');
    expect(formatMs(3_200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
    expect(formatMs(8_100_000)).toBe('2h 15m');
  });

  it('formats timestamps and fits text to a width', () => {
    expect(formatTimestamp('2026-03-01T12:00:05.123Z')).toBe('2026-03-01 12:00:05');
    expect(truncate('abcdefgh', 6)).toBe('abc...');
    expect(truncate('abc', 6)).toBe('abc');
    expect(padRight('ab', 4)).toBe('ab  ');
    expect(padRight('\u001b[1mab\u001b[22m', 3)).toBe('\u001b[1mab\u001b[22m ');
  });
});

describe('exit codes', () => {
  it('maps errors and outcomes', () => {
    expect(exitCodeForError(new JobBusyError('j-20260301-0000abcd'))).toBe(5);
    expect(exitCodeForError(new ToolNotFoundError('x'))).toBe(8);
    expect(exitCodeForError(new Error('plain'))).toBe(1);

    expect(exitCodeForOutcome({ ok: true, status: 'completed' })).toBe(0);
    expect(exitCodeForOutcome({ ok: false, reason: 'failed', stepIndex: 2 })).toBe(2);
    expect(exitCodeForOutcome({ ok: false, reason: 'aborted' })).toBe(130);
    expect(exitCodeForOutcome({ ok: false, reason: 'planning', error: new PlanningError('x') })).toBe(6);
  });
});

describe('InteractiveRenderer', () => {
  function capture() {
    let out = '';
    const renderer = new InteractiveRenderer({ write: (chunk) => (out += chunk) });
    return { renderer, lines: () => stripAnsi(out).split('\n') };
  }

  const job: Job = {
    id: 'j-20260301-0000abcd',
    task: 'copy notes',
    status: 'failed',
    steps: [
      {
        index: 0,
        toolName: 'read_file',
        parameters: { path: 'a.md' },
        status: 'failed',
        result: { ok: false, error: { kind: 'ToolExecutionError', message: 'ENOENT' }, durationMs: 12 },
        retryCount: 1,
        startedAt: '2026-03-01T00:00:01.000Z',
        endedAt: '2026-03-01T00:00:01.012Z'
      }
    ],
    memoryContext: [],
    artifacts: {},
    metadata: {},
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:01.012Z'
  };

  it('prints a failed job with a retry tip', () => {
    const { renderer, lines } = capture();
    renderer.jobFinished(job, { ok: false, reason: 'failed', stepIndex: 0 });
    expect(lines()).toEqual([
      '',
      '  Job j-20260301-0000abcd failed at step 1',
      '  Tip: tasklane retry j-20260301-0000abcd 0  or  tasklane resume j-20260301-0000abcd',
      ''
    ]);
  });

  it('prints step results in the job details', () => {
    const { renderer, lines } = capture();
    renderer.jobDetails(job);
    expect(lines()).toContain('  ✖ 1. read_file (12ms) [retry 1]');
    expect(lines()).toContain('      ToolExecutionError: ENOENT');
  });

  it('says so when there are no jobs', () => {
    const { renderer, lines } = capture();
    renderer.jobTable([]);
    expect(lines()).toEqual(['  No jobs found.', '']);
  });
});
