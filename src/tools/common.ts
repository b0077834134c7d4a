import { isAbsolute, relative, resolve } from 'node:path';
import type { z } from 'zod';

export interface BuiltinToolOptions {
  /** Base directory for relative paths; file tools refuse to leave it. */
  workspaceDir: string;
  /** Engine state directory; `git_commit` never commits it. */
  stateDir?: string;
  /** Injected for tests; defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

/** Validate step parameters; the message lists every offending field. */
export function parseParams<S extends z.ZodTypeAny>(tool: string, schema: S, parameters: unknown): z.infer<S> {
  const res = schema.safeParse(parameters);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '(parameters)'}: ${i.message}`);
    throw new Error(`Invalid parameters for ${tool}: ${issues.join('; ')}`);
  }
  return res.data;
}

/** Absolute path of `p` inside `root`; paths that resolve outside it are rejected. */
export function resolveInWorkspace(root: string, p: string): string {
  const base = resolve(root);
  const full = resolve(base, p);
  const rel = relative(base, full);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`Path '${p}' is outside the workspace`);
  }
  return full;
}

/** Workspace-relative form used in payloads and artifact references. */
export function workspaceRelative(root: string, full: string): string {
  return relative(resolve(root), full) || '.';
}
