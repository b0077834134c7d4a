import { appendFile, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ensureDir, errorMessage, isErrnoException } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { PersistenceError } from '../errors.js';
import type { Job } from '../job/types.js';
import { MemoryRecord, type MemoryStore } from './types.js';

/** Lowercased word tokens (letters and digits of any script) of two or more characters. */
export function tokenize(text: string): Set<string> {
  const out = new Set<string>();
  for (const t of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (t.length >= 2) out.add(t);
  }
  return out;
}

/** One-paragraph description of a finished job, as stored in memory. */
export function summarizeJob(job: Job): string {
  const tools = job.steps.map((s) => s.toolName);
  const plan = tools.length ? tools.join(' -> ') : '(no plan)';
  return `Task: ${job.task}\nPlan: ${plan}\nOutcome: ${job.status}`;
}

/**
 * Append-only task memory in a JSONL file. Search ranks records by how many task tokens they
 * share with the query; ties go to the most recent record.
 */
export class JsonlMemoryStore implements MemoryStore {
  constructor(
    readonly path: string,
    private logger?: Logger
  ) {}

  async search(task: string, limit: number): Promise<string[]> {
    if (limit <= 0) return [];
    const query = tokenize(task);
    if (query.size === 0) return [];

    const records = await this.readAll();
    const scored: Array<{ record: MemoryRecord; score: number; order: number }> = [];
    records.forEach((record, order) => {
      let score = 0;
      for (const t of tokenize(record.task)) if (query.has(t)) score += 1;
      if (score > 0) scored.push({ record, score, order });
    });

    scored.sort((a, b) => b.score - a.score || b.order - a.order);
    return scored.slice(0, limit).map((s) => s.record.summary);
  }

  async record(entry: Omit<MemoryRecord, 'recordedAt'>): Promise<MemoryRecord> {
    const record = MemoryRecord.parse({ ...entry, recordedAt: new Date().toISOString() });
    try {
      await ensureDir(dirname(this.path));
      await appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf8');
    } catch (err) {
      throw new PersistenceError(`Failed to append to memory ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    return record;
  }

  async readAll(): Promise<MemoryRecord[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new PersistenceError(`Failed to read memory ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    const records: MemoryRecord[] = [];
    const lines = content.split('\n');
    lines.forEach((line, i) => {
      const trimmed = line.trim();
      if (!trimmed) return;
      try {
        records.push(MemoryRecord.parse(JSON.parse(trimmed)));
      } catch (err) {
        this.logger?.warn('skipping malformed memory record', { line: i + 1, error: errorMessage(err) });
      }
    });
    return records;
  }
}
