import type { ToolRegistry } from '../core/tools/registry.js';
import type { BuiltinToolOptions } from './common.js';
import { registerFsTools } from './fs.js';
import { registerGitTools } from './git.js';
import { registerHttpTools } from './http.js';
import { registerShellTools } from './shell.js';

export type { BuiltinToolOptions } from './common.js';

/** Register every built-in tool on `registry`. */
export function registerBuiltinTools(registry: ToolRegistry, opts: BuiltinToolOptions): ToolRegistry {
  registerFsTools(registry, opts);
  registerShellTools(registry, opts);
  registerHttpTools(registry, opts);
  registerGitTools(registry, opts);
  return registry;
}
