import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { capability } from '../core/tools/types.js';
import type { ToolRegistry } from '../core/tools/registry.js';
import { fileExists, writeJson, writeText } from '../utils/fs.js';
import { parseParams, resolveInWorkspace, workspaceRelative, type BuiltinToolOptions } from './common.js';

const MAX_READ_BYTES = 10 * 1024 * 1024;

const PathParams = z.object({ path: z.string().min(1) });
const WriteFileParams = z.object({
  path: z.string().min(1),
  content: z.string(),
  /** Artifact name to publish; defaults to the workspace-relative path. */
  artifact: z.string().min(1).optional()
});
const WriteJsonParams = z.object({
  path: z.string().min(1),
  data: z.unknown(),
  artifact: z.string().min(1).optional()
});
const ListFilesParams = z.object({
  path: z.string().min(1).default('.'),
  recursive: z.boolean().default(false)
});

export function registerFsTools(registry: ToolRegistry, opts: BuiltinToolOptions): void {
  const root = opts.workspaceDir;

  registry.register(
    'read_file',
    capability(async (parameters) => {
      const { path } = parseParams('read_file', PathParams, parameters);
      const full = resolveInWorkspace(root, path);
      const info = await stat(full);
      if (info.size > MAX_READ_BYTES) throw new Error(`File '${path}' is ${info.size} bytes, over the ${MAX_READ_BYTES} byte limit`);
      return { path: workspaceRelative(root, full), content: await readFile(full, 'utf8'), sizeBytes: info.size };
    }),
    'Read a UTF-8 text file. Parameters: { "path": string }'
  );

  registry.register(
    'write_file',
    capability(async (parameters, context) => {
      const { path, content, artifact } = parseParams('write_file', WriteFileParams, parameters);
      const full = resolveInWorkspace(root, path);
      await writeText(full, content);
      const rel = workspaceRelative(root, full);
      context.addArtifact(artifact ?? rel, rel);
      return { path: rel, bytes: Buffer.byteLength(content, 'utf8') };
    }),
    'Create or overwrite a text file, creating parent directories. Parameters: { "path": string, "content": string }'
  );

  registry.register(
    'list_files',
    capability(async (parameters) => {
      const { path, recursive } = parseParams('list_files', ListFilesParams, parameters);
      const full = resolveInWorkspace(root, path);
      const files = await listDir(full, recursive);
      return { path: workspaceRelative(root, full), files };
    }),
    'List directory entries (directories end with "/"). Parameters: { "path"?: string, "recursive"?: boolean }'
  );

  registry.register(
    'file_exists',
    capability(async (parameters) => {
      const { path } = parseParams('file_exists', PathParams, parameters);
      return { path, exists: await fileExists(resolveInWorkspace(root, path)) };
    }),
    'Check whether a file or directory exists. Parameters: { "path": string }'
  );

  registry.register(
    'read_json',
    capability(async (parameters) => {
      const { path } = parseParams('read_json', PathParams, parameters);
      const raw = await readFile(resolveInWorkspace(root, path), 'utf8');
      try {
        return { path, data: JSON.parse(raw) };
      } catch (err) {
        throw new Error(`File '${path}' is not valid JSON`, { cause: err });
      }
    }),
    'Read and parse a JSON file. Parameters: { "path": string }'
  );

  registry.register(
    'write_json',
    capability(async (parameters, context) => {
      const { path, data, artifact } = parseParams('write_json', WriteJsonParams, parameters);
      const full = resolveInWorkspace(root, path);
      await writeJson(full, data ?? null);
      const rel = workspaceRelative(root, full);
      context.addArtifact(artifact ?? rel, rel);
      return { path: rel };
    }),
    'Write a value as pretty-printed JSON. Parameters: { "path": string, "data": any }'
  );
}

async function listDir(dir: string, recursive: boolean, prefix = ''): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const out: string[] = [];
  for (const e of entries) {
    const name = `${prefix}${e.name}`;
    if (e.isDirectory()) {
      out.push(`${name}/`);
      if (recursive) out.push(...(await listDir(join(dir, e.name), true, `${name}/`)));
    } else {
      out.push(name);
    }
  }
  return out;
}
