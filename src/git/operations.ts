import { execa } from 'execa';
import { realpath } from 'node:fs/promises';
import { isAbsolute, relative, sep } from 'node:path';

import { LOG_FORMAT, parseDiff, parseLog, parseStatus, type DiffResult, type LogEntry, type StatusResult } from './parsers.js';

export interface GitRepo {
  repoRoot: string;
  signal?: AbortSignal;
}

export function git(repoRoot: string, signal?: AbortSignal): GitRepo {
  return { repoRoot, signal };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    cancelSignal: repo.signal,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return res.stdout;
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

export async function status(repo: GitRepo): Promise<StatusResult> {
  return parseStatus(await run(repo, ['status', '--porcelain=v1', '--branch']));
}

/**
 * Working tree changes against the index, or the index against HEAD with `staged`.
 * `paths` narrows the diff to those pathspecs.
 */
export async function diff(repo: GitRepo, opts: { staged?: boolean; paths?: string[] } = {}): Promise<DiffResult> {
  const base = opts.staged ? ['diff', '--cached'] : ['diff'];
  const tail = opts.paths?.length ? ['--', ...opts.paths] : [];
  const [rawDiff, nameStatus, numStat] = await Promise.all([
    run(repo, [...base, ...tail]),
    run(repo, [...base, '--name-status', ...tail]),
    run(repo, [...base, '--numstat', ...tail])
  ]);
  return parseDiff({ rawDiff, nameStatus, numStat });
}

export async function add(repo: GitRepo, paths: string[]): Promise<void> {
  await run(repo, ['add', '--', ...(paths.length ? paths : ['.'])]);
}

export type CommitResult = { committed: true; hash: string } | { committed: false; reason: 'nothing_staged' };

export interface CommitOptions {
  /** Absolute directories (engine state) that are unstaged before committing. */
  exclude?: string[];
}

/** Commit what is staged, after unstaging anything under `exclude`. */
export async function commit(repo: GitRepo, message: string, opts: CommitOptions = {}): Promise<CommitResult> {
  // Staged names and the reset pathspecs are both relative to the top level, not to `repoRoot`.
  const top = git((await run(repo, ['rev-parse', '--show-toplevel'])).trim(), repo.signal);
  const stagedPaths = async () =>
    (await run(top, ['diff', '--cached', '--name-only']))
      .split('\n')
      .map((s) => s.trim())
      .filter(Boolean);

  const excluded = await repoRelativeDirs(top.repoRoot, opts.exclude ?? []);
  const engine = (await stagedPaths()).filter((p) => excluded.some((d) => p === d || p.startsWith(`${d}/`)));
  if (engine.length > 0) await run(top, ['reset', '-q', '--', ...engine]);
  if ((await stagedPaths()).length === 0) return { committed: false, reason: 'nothing_staged' };

  await run(top, ['commit', '-m', message]);
  return { committed: true, hash: await getCurrentCommit(top) };
}

// Directories outside the repository, or the repository itself, are dropped.
async function repoRelativeDirs(topLevel: string, dirs: string[]): Promise<string[]> {
  const root = await canonical(topLevel);
  const out: string[] = [];
  for (const dir of dirs) {
    const rel = relative(root, await canonical(dir));
    if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) continue;
    out.push(rel.split(sep).join('/'));
  }
  return out;
}

// git reports the resolved top level; a state dir that does not exist yet is taken as given.
async function canonical(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    return path;
  }
}

export async function log(repo: GitRepo, limit = 10): Promise<LogEntry[]> {
  return parseLog(await run(repo, ['log', `-n${Math.max(1, Math.floor(limit))}`, `--format=${LOG_FORMAT}`]));
}
