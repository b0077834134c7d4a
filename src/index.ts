export * from './core/errors.js';
export * from './core/job/types.js';
export { JobManager, type JobManagerOptions, type ListJobsOptions, type RunOptions } from './core/job-manager.js';
export {
  ExecutionEngine,
  type ExecutionEngineOptions,
  type ExecutionHooks,
  type ExecutionOutcome,
  type StepRecorder
} from './core/execution/engine.js';
export { JobStore, type JobPaths } from './core/job/store.js';
export { countSteps, isTerminal, type StepCounts } from './core/job/status.js';
export { ToolRegistry, toJsonSafe } from './core/tools/registry.js';
export {
  capability,
  type Capability,
  type ExecuteOptions,
  type InvocationContext,
  type ToolCatalogEntry,
  type ToolDescriptor
} from './core/tools/types.js';
export { CommandPlanner, type CommandPlannerOptions } from './core/planner/command-planner.js';
export { FilePlanner, readPlanFile } from './core/planner/file-planner.js';
export { buildPlannerPrompt } from './core/planner/prompt.js';
export { DEFAULT_MAX_PLAN_STEPS, parsePlan, parsePlanText } from './core/planner/schema.js';
export type { PlannerGateway, PlanRequest } from './core/planner/types.js';
export { JsonlMemoryStore, summarizeJob } from './core/memory/jsonl-store.js';
export type { MemoryRecord, MemoryStore } from './core/memory/types.js';
export { runTask, type RunTaskHooks, type RunTaskOptions, type RunTaskOutcome, type RunTaskResult } from './core/agent.js';
export { LedgerReader } from './core/ledger/reader.js';
export type { LedgerEntry } from './core/ledger/types.js';
export { loadConfig, type LoadConfigOptions, type TasklaneConfig } from './config/config.js';
export { registerBuiltinTools, type BuiltinToolOptions } from './tools/index.js';
export { Logger, type LoggerOptions, type LogLevel } from './utils/logger.js';
