import { join, resolve } from 'node:path';
import { z } from 'zod';

import { errorMessage, fileExists, readYaml } from '../utils/fs.js';
import { MAX_TIMER_DELAY_MS } from '../core/tools/types.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export const DEFAULT_STATE_DIR = '.tasklane';
export const CONFIG_FILE_NAME = 'config.yaml';

export const DEFAULT_STEP_TIMEOUT_MS = 120_000;
const MIN_STEP_TIMEOUT_MS = 1_000;

const PlannerConfig = z
  .object({
    command: z.string().min(1).default('ollama'),
    args: z.array(z.string()).default(['run', 'llama3']),
    input: z.enum(['prompt', 'json']).default('prompt'),
    timeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(300_000)
  })
  .strict();

const MemoryConfig = z
  .object({
    enabled: z.boolean().default(true),
    limit: z.number().int().nonnegative().default(3)
  })
  .strict();

const LogConfig = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    json: z.boolean().default(false)
  })
  .strict();

export const TasklaneConfigSchema = z
  .object({
    stateDir: z.string().min(1).default(DEFAULT_STATE_DIR),
    workspaceDir: z.string().min(1).default('.'),
    stepTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(DEFAULT_STEP_TIMEOUT_MS),
    maxPlanSteps: z.number().int().positive().default(25),
    planner: PlannerConfig.default({}),
    memory: MemoryConfig.default({}),
    log: LogConfig.default({})
  })
  .strict();

export type TasklaneConfig = z.infer<typeof TasklaneConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; when absent `<stateDir>/config.yaml` is used if it exists. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Effective configuration: file values over defaults, environment over both.
 * `stateDir` and `workspaceDir` come back absolute, resolved against `cwd`.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<TasklaneConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  const envStateDir = nonEmpty(env.TASKLANE_STATE_DIR);
  const path = opts.configPath
    ? resolve(cwd, opts.configPath)
    : join(resolve(cwd, envStateDir ?? DEFAULT_STATE_DIR), CONFIG_FILE_NAME);

  let raw: unknown = {};
  if (opts.configPath || (await fileExists(path))) {
    try {
      raw = (await readYaml(path)) ?? {};
    } catch (err) {
      throw new Error(`Cannot read config ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  const parsed = TasklaneConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid config ${path}: ${issues.join('; ')}`);
  }
  const config = parsed.data;

  if (envStateDir) config.stateDir = envStateDir;
  config.stepTimeoutMs = resolveStepTimeoutMs(env.TASKLANE_STEP_TIMEOUT_MS, config.stepTimeoutMs);
  const envLevel = resolveLogLevel(env.TASKLANE_LOG_LEVEL);
  if (envLevel) config.log.level = envLevel;

  config.stateDir = resolve(cwd, config.stateDir);
  config.workspaceDir = resolve(cwd, config.workspaceDir);
  return config;
}

/**
 * `TASKLANE_STEP_TIMEOUT_MS`: `0` disables the bound, other values are floored and clamped
 * between 1s and the largest delay a timer accepts.
 */
export function resolveStepTimeoutMs(raw: string | undefined, fallback = DEFAULT_STEP_TIMEOUT_MS): number {
  if (!raw || !raw.trim()) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;

  const ms = Math.floor(parsed);
  if (ms === 0) return 0;
  if (ms < MIN_STEP_TIMEOUT_MS) return MIN_STEP_TIMEOUT_MS;
  return Math.min(ms, MAX_TIMER_DELAY_MS);
}

export function resolveLogLevel(raw: string | undefined): LogLevel | undefined {
  const v = raw?.trim().toLowerCase();
  return isLogLevel(v) ? v : undefined;
}

function nonEmpty(v: string | undefined): string | undefined {
  return v && v.trim() ? v.trim() : undefined;
}
