import { join } from 'node:path';

import { loadConfig, type TasklaneConfig } from '../config/config.js';
import { JobManager } from '../core/job-manager.js';
import { JsonlMemoryStore } from '../core/memory/jsonl-store.js';
import type { MemoryStore } from '../core/memory/types.js';
import { ToolRegistry } from '../core/tools/registry.js';
import { registerBuiltinTools } from '../tools/index.js';
import { Logger } from '../utils/logger.js';

export interface CliContextOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
  quiet?: boolean;
  /** Replaces the built-in tool set (tests). */
  registry?: ToolRegistry;
  logger?: Logger;
}

export interface CliContext {
  config: TasklaneConfig;
  logger: Logger;
  registry: ToolRegistry;
  manager: JobManager;
  memory?: MemoryStore;
}

/** What every command result reduces to; `cli/index.ts` turns `exitCode` into the process exit status. */
export interface CommandResult {
  ok: boolean;
  exitCode: number;
  jobId?: string;
  details?: string;
}

export async function createCliContext(opts: CliContextOptions = {}): Promise<CliContext> {
  const config = await loadConfig({ cwd: opts.cwd, configPath: opts.configPath, env: opts.env });
  const logger =
    opts.logger ??
    new Logger({
      level: opts.verbose ? 'debug' : config.log.level,
      json: Boolean(opts.quiet) || config.log.json
    });

  const registry = opts.registry ?? registerBuiltinTools(new ToolRegistry(logger.child({ component: 'tools' })), {
    workspaceDir: config.workspaceDir,
    stateDir: config.stateDir
  });

  const manager = new JobManager(config.stateDir, registry, {
    logger: logger.child({ component: 'jobs' }),
    stepTimeoutMs: config.stepTimeoutMs,
    maxPlanSteps: config.maxPlanSteps
  });

  const memory = config.memory.enabled
    ? new JsonlMemoryStore(join(config.stateDir, 'memory.jsonl'), logger.child({ component: 'memory' }))
    : undefined;

  return { config, logger, registry, manager, memory };
}
