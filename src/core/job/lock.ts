import { link, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';

import { errorMessage, isErrnoException, stagingPath } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { isPidAlive } from '../../utils/process.js';
import { JobBusyError, JobNotFoundError, PersistenceError } from '../errors.js';
import { KeyedMutex } from './mutex.js';

const LockFileContent = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string()
});
type LockHolder = z.infer<typeof LockFileContent>;

interface LockSnapshot {
  raw: string;
  holder: LockHolder | null;
  mtimeMs: number;
}

/** A lock file without a valid holder is only taken over once it is older than this. */
export const UNREADABLE_LOCK_GRACE_MS = 10_000;
const RECORD_LOCK_WAIT_MS = 5_000;

export interface JobLockHandle {
  readonly jobId: string;
  release(): Promise<void>;
}

// Lock files held by this process, keyed by absolute path. Module-level so that two
// managers over the same state directory exclude each other inside one process too.
const heldInProcess = new Set<string>();
const recordSections = new KeyedMutex();

/**
 * Single-writer guard for executing a job.
 *
 * The in-process reservation is taken synchronously, so of two concurrent callers exactly
 * one gets past it; the lock file extends the guarantee across processes. Lock files are
 * published complete (staged, then hard-linked into place), so an existing file always names
 * its holder. A holder whose pid is gone is stale and is taken over.
 */
export async function acquireJobLock(jobId: string, lockPath: string, logger?: Logger): Promise<JobLockHandle> {
  const key = resolve(lockPath);
  if (heldInProcess.has(key)) throw new JobBusyError(jobId, process.pid);
  heldInProcess.add(key);

  try {
    await mkdir(dirname(key), { recursive: true });
    const busy = await claim(jobId, key, logger);
    if (busy) throw new JobBusyError(jobId, busy.pid);
  } catch (err) {
    heldInProcess.delete(key);
    throw err;
  }

  let released = false;
  return {
    jobId,
    async release() {
      if (released) return;
      released = true;
      try {
        await rm(key, { force: true });
      } finally {
        heldInProcess.delete(key);
      }
    }
  };
}

/**
 * Run a read-modify-write of a job record exclusively. Sections on one path queue in-process;
 * across processes the caller waits for the record lock file, up to `waitMs`.
 * The job directory must exist: a missing one means the job does not.
 */
export async function withRecordLock<T>(
  jobId: string,
  lockPath: string,
  fn: () => Promise<T>,
  opts: { logger?: Logger; waitMs?: number } = {}
): Promise<T> {
  const key = resolve(lockPath);
  return await recordSections.run(key, async () => {
    const deadline = Date.now() + (opts.waitMs ?? RECORD_LOCK_WAIT_MS);
    for (let delay = 5; ; delay = Math.min(delay * 2, 100)) {
      const busy = await claim(jobId, key, opts.logger);
      if (!busy) break;
      if (Date.now() >= deadline) throw new JobBusyError(jobId, busy.pid, 'updated');
      await sleep(delay);
    }
    try {
      return await fn();
    } finally {
      await rm(key, { force: true });
    }
  });
}

/** `null` once the lock is ours, otherwise what is known of the current holder. */
async function claim(jobId: string, path: string, logger: Logger | undefined): Promise<{ pid?: number } | null> {
  for (let attempt = 0; attempt < 2; attempt++) {
    if (await publish(jobId, path)) return null;

    const seen = await inspect(jobId, path);
    // Released between the two calls.
    if (!seen) continue;
    if (!isStale(seen)) return { pid: seen.holder?.pid };
    if (!(await breakStale(jobId, path, seen, logger))) return { pid: seen.holder?.pid };
  }
  return {};
}

async function publish(jobId: string, path: string): Promise<boolean> {
  const staging = stagingPath(path);
  const content: LockHolder = { pid: process.pid, acquiredAt: new Date().toISOString() };
  try {
    await writeFile(staging, JSON.stringify(content), { encoding: 'utf8', flag: 'wx' });
    await link(staging, path);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') return false;
    if (isErrnoException(err) && err.code === 'ENOENT') throw new JobNotFoundError(jobId);
    throw new PersistenceError(`Failed to create lock for job '${jobId}': ${errorMessage(err)}`, { cause: err });
  } finally {
    await rm(staging, { force: true });
  }
}

async function inspect(jobId: string, path: string): Promise<LockSnapshot | null> {
  try {
    const [raw, info] = await Promise.all([readFile(path, 'utf8'), stat(path)]);
    return { raw, holder: parseHolder(raw), mtimeMs: info.mtimeMs };
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw new PersistenceError(`Failed to read lock for job '${jobId}': ${errorMessage(err)}`, { cause: err });
  }
}

function parseHolder(raw: string): LockHolder | null {
  try {
    const parsed = LockFileContent.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// Callers never find their own live lock here: in-process holders are excluded before
// the file is consulted, so a file naming this pid was left behind.
function isStale(seen: LockSnapshot): boolean {
  if (seen.holder) return seen.holder.pid === process.pid || !isPidAlive(seen.holder.pid);
  return Date.now() - seen.mtimeMs > UNREADABLE_LOCK_GRACE_MS;
}

/**
 * Remove a stale lock, unless another process replaced it since it was inspected. Breakers
 * serialize on a `.break` sibling; `false` means another process is breaking it.
 */
async function breakStale(jobId: string, path: string, seen: LockSnapshot, logger: Logger | undefined): Promise<boolean> {
  const breaker = `${path}.break`;
  if (!(await publish(jobId, breaker))) {
    const other = await inspect(jobId, breaker);
    if (other && isStale(other)) await rm(breaker, { force: true });
    return false;
  }
  try {
    const current = await inspect(jobId, path);
    if (current && current.raw === seen.raw) {
      logger?.warn('removing stale job lock', { jobId, lock: path, holderPid: seen.holder?.pid ?? null });
      await rm(path, { force: true });
    }
    return true;
  } finally {
    await rm(breaker, { force: true });
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
