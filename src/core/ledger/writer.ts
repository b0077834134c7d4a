import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoException } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput } from './types.js';

export class LedgerWriter {
  private nextSeq: number;
  private ledgerPath: string;
  // Set when the file ends in a partial line; the next entry starts on a fresh one.
  private pendingNewline: boolean;

  private constructor(ledgerPath: string, nextSeq: number, pendingNewline: boolean) {
    this.ledgerPath = ledgerPath;
    this.nextSeq = nextSeq;
    this.pendingNewline = pendingNewline;
  }

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });

    const { nextSeq, pendingNewline } = await scanLedger(ledgerPath);
    return new LedgerWriter(ledgerPath, nextSeq, pendingNewline);
  }

  async append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry: LedgerEntry = LedgerEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });

    // One JSON object per line (JSONL). Append-only.
    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${this.pendingNewline ? '\n' : ''}${JSON.stringify(entry)}\n`, 'utf8');
      await fh.sync();
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    this.pendingNewline = false;
    return entry;
  }
}

async function scanLedger(ledgerPath: string): Promise<{ nextSeq: number; pendingNewline: boolean }> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return { nextSeq: 1, pendingNewline: false };
    throw err;
  }
  const pendingNewline = content.length > 0 && !content.endsWith('\n');

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // A trailing partial line (crash mid-append) is skipped; the last parseable seq wins.
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = parseSeq(lines[i]);
    if (seq !== null) return { nextSeq: seq + 1, pendingNewline };
  }
  return { nextSeq: 1, pendingNewline };
}

function parseSeq(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
      return parsed.seq;
    }
    return null;
  } catch {
    return null;
  }
}
