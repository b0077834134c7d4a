import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage, isErrnoException, writeJsonAtomic } from '../../utils/fs.js';
import { isJobId } from '../../utils/id.js';
import type { Logger } from '../../utils/logger.js';
import { JobNotFoundError, PersistenceError } from '../errors.js';
import { Job } from './types.js';

export interface JobPaths {
  jobDir: string;
  recordPath: string;
  ledgerPath: string;
  lockPath: string;
  recordLockPath: string;
}

/**
 * Durable job records: `<stateDir>/jobs/<id>/job.json`, one complete document per job.
 */
export class JobStore {
  readonly jobsDir: string;

  constructor(
    readonly stateDir: string,
    private logger?: Logger
  ) {
    this.jobsDir = join(stateDir, 'jobs');
  }

  paths(jobId: string): JobPaths {
    const jobDir = join(this.jobsDir, jobId);
    return {
      jobDir,
      recordPath: join(jobDir, 'job.json'),
      ledgerPath: join(jobDir, 'ledger.jsonl'),
      lockPath: join(jobDir, 'job.lock'),
      recordLockPath: join(jobDir, 'record.lock')
    };
  }

  async read(jobId: string): Promise<Job> {
    // Ids double as directory names; anything else never reaches the filesystem.
    if (!isJobId(jobId)) throw new JobNotFoundError(jobId);

    let raw: string;
    try {
      raw = await readFile(this.paths(jobId).recordPath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') throw new JobNotFoundError(jobId);
      throw new PersistenceError(`Failed to read job '${jobId}': ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`Job record '${jobId}' is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const res = Job.safeParse(parsed);
    if (!res.success) {
      const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new PersistenceError(`Job record '${jobId}' failed validation: ${issues.join('; ')}`);
    }
    return res.data;
  }

  /** Commit the full record (stage, fsync, rename). */
  async write(job: Job): Promise<void> {
    try {
      await writeJsonAtomic(this.paths(job.id).recordPath, job);
    } catch (err) {
      throw new PersistenceError(`Failed to persist job '${job.id}': ${errorMessage(err)}`, { cause: err });
    }
  }

  async exists(jobId: string): Promise<boolean> {
    try {
      await this.read(jobId);
      return true;
    } catch (err) {
      if (err instanceof JobNotFoundError) return false;
      throw err;
    }
  }

  async listIds(): Promise<string[]> {
    try {
      const entries = await readdir(this.jobsDir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && isJobId(e.name))
        .map((e) => e.name)
        .sort((a, b) => a.localeCompare(b));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new PersistenceError(`Failed to list jobs in ${this.jobsDir}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Every readable record; directories without a valid record are reported and skipped. */
  async readAll(): Promise<Job[]> {
    const jobs: Job[] = [];
    for (const id of await this.listIds()) {
      try {
        jobs.push(await this.read(id));
      } catch (err) {
        if (!(err instanceof JobNotFoundError) && !(err instanceof PersistenceError)) throw err;
        this.logger?.warn('skipping unreadable job record', { jobId: id, error: err.message });
      }
    }
    return jobs;
  }
}
