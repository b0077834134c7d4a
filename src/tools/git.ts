import { z } from 'zod';

import { capability } from '../core/tools/types.js';
import type { ToolRegistry } from '../core/tools/registry.js';
import { add, commit, diff, git, log, status } from '../git/operations.js';
import { parseParams, resolveInWorkspace, type BuiltinToolOptions } from './common.js';

const RepoParams = z.object({ repo: z.string().min(1).default('.') });
const DiffParams = RepoParams.extend({
  staged: z.boolean().default(false),
  paths: z.array(z.string().min(1)).default([])
});
const AddParams = RepoParams.extend({ paths: z.array(z.string().min(1)).default([]) });
const CommitParams = RepoParams.extend({ message: z.string().trim().min(1) });
const LogParams = RepoParams.extend({ limit: z.number().int().positive().max(200).default(10) });

export function registerGitTools(registry: ToolRegistry, opts: BuiltinToolOptions): void {
  const repoAt = (dir: string, signal: AbortSignal) => git(resolveInWorkspace(opts.workspaceDir, dir), signal);

  registry.register(
    'git_status',
    capability(async (parameters, context) => {
      const p = parseParams('git_status', RepoParams, parameters);
      return await status(repoAt(p.repo, context.signal));
    }),
    'Branch and changed paths of a git repository. Parameters: { "repo"?: string }'
  );

  registry.register(
    'git_diff',
    capability(async (parameters, context) => {
      const p = parseParams('git_diff', DiffParams, parameters);
      return await diff(repoAt(p.repo, context.signal), { staged: p.staged, paths: p.paths });
    }),
    'Diff of the working tree (or the index with "staged"). Parameters: { "repo"?: string, "staged"?: boolean, "paths"?: string[] }'
  );

  registry.register(
    'git_add',
    capability(async (parameters, context) => {
      const p = parseParams('git_add', AddParams, parameters);
      await add(repoAt(p.repo, context.signal), p.paths);
      return { staged: p.paths.length ? p.paths : ['.'] };
    }),
    'Stage paths (everything when omitted). Parameters: { "repo"?: string, "paths"?: string[] }'
  );

  registry.register(
    'git_commit',
    capability(async (parameters, context) => {
      const p = parseParams('git_commit', CommitParams, parameters);
      const res = await commit(repoAt(p.repo, context.signal), p.message, {
        exclude: opts.stateDir ? [opts.stateDir] : []
      });
      if (res.committed) context.addArtifact('commit', res.hash);
      return res;
    }),
    'Commit staged changes. Parameters: { "repo"?: string, "message": string }'
  );

  registry.register(
    'git_log',
    capability(async (parameters, context) => {
      const p = parseParams('git_log', LogParams, parameters);
      return { commits: await log(repoAt(p.repo, context.signal), p.limit) };
    }),
    'Most recent commits, newest first. Parameters: { "repo"?: string, "limit"?: number }'
  );
}
