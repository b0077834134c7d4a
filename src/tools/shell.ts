import { execa } from 'execa';
import { z } from 'zod';

import { capability } from '../core/tools/types.js';
import type { ToolRegistry } from '../core/tools/registry.js';
import { parseParams, resolveInWorkspace, type BuiltinToolOptions } from './common.js';

const MAX_OUTPUT_CHARS = 100_000;

const RunShellParams = z.object({
  command: z.string().min(1),
  /** Working directory relative to the workspace. */
  cwd: z.string().min(1).default('.'),
  /** A non-zero exit fails the step unless this is set. */
  allowFailure: z.boolean().default(false)
});

export interface ShellResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export function registerShellTools(registry: ToolRegistry, opts: BuiltinToolOptions): void {
  registry.register(
    'run_shell',
    capability(async (parameters, context): Promise<ShellResult> => {
      const { command, cwd, allowFailure } = parseParams('run_shell', RunShellParams, parameters);
      const res = await execa(command, [], {
        shell: true,
        cwd: resolveInWorkspace(opts.workspaceDir, cwd),
        cancelSignal: context.signal,
        reject: false,
        stdin: 'ignore',
        stdout: 'pipe',
        stderr: 'pipe'
      });
      if (res.isCanceled) throw new Error('command cancelled');

      const out: ShellResult = {
        exitCode: res.exitCode ?? -1,
        stdout: clip(res.stdout),
        stderr: clip(res.stderr)
      };
      if (out.exitCode !== 0 && !allowFailure) {
        const detail = out.stderr.trim() || out.stdout.trim();
        throw new Error(`Command exited with code ${out.exitCode}${detail ? `: ${detail.slice(0, 500)}` : ''}`);
      }
      return out;
    }),
    'Run a shell command in the workspace. Parameters: { "command": string, "cwd"?: string, "allowFailure"?: boolean }'
  );
}

function clip(s: string): string {
  return s.length > MAX_OUTPUT_CHARS ? `${s.slice(0, MAX_OUTPUT_CHARS)}\n[truncated]` : s;
}
