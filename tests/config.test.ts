import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadConfig, resolveLogLevel, resolveStepTimeoutMs } from '../src/config/config.js';
import { tempDir } from './fixtures.js';

describe('loadConfig', () => {
  it('uses defaults and resolves directories against cwd', async () => {
    const cwd = await tempDir('tasklane-config-');
    const config = await loadConfig({ cwd, env: {} });

    expect(config.stateDir).toBe(join(cwd, '.tasklane'));
    expect(config.workspaceDir).toBe(cwd);
    expect(config.stepTimeoutMs).toBe(120_000);
    expect(config.maxPlanSteps).toBe(25);
    expect(config.planner).toEqual({ command: 'ollama', args: ['run', 'llama3'], input: 'prompt', timeoutMs: 300_000 });
    expect(config.memory).toEqual({ enabled: true, limit: 3 });
    expect(config.log).toEqual({ level: 'info', json: false });
  });

  it('reads config.yaml from the state directory', async () => {
    const cwd = await tempDir('tasklane-config-');
    await mkdir(join(cwd, 'state'), { recursive: true });
    await writeFile(
      join(cwd, 'state', 'config.yaml'),
      'workspaceDir: ws\nstepTimeoutMs: 5000\nplanner:\n  command: ./plan.sh\n  args: []\nmemory:\n  enabled: false\n',
      'utf8'
    );

    const config = await loadConfig({ cwd, env: { TASKLANE_STATE_DIR: 'state' } });
    expect(config.stateDir).toBe(join(cwd, 'state'));
    expect(config.workspaceDir).toBe(join(cwd, 'ws'));
    expect(config.stepTimeoutMs).toBe(5000);
    expect(config.planner).toEqual({ command: './plan.sh', args: [], input: 'prompt', timeoutMs: 300_000 });
    expect(config.memory.enabled).toBe(false);
  });

  it('lets the environment override the file', async () => {
    const cwd = await tempDir('tasklane-config-');
    await writeFile(join(cwd, 'custom.yaml'), 'stepTimeoutMs: 5000\nlog:\n  level: debug\n', 'utf8');

    const config = await loadConfig({
      cwd,
      configPath: 'custom.yaml',
      env: { TASKLANE_STEP_TIMEOUT_MS: '0', TASKLANE_LOG_LEVEL: 'ERROR' }
    });
    expect(config.stepTimeoutMs).toBe(0);
    expect(config.log.level).toBe('error');
  });

  it('rejects invalid settings and a missing explicit file', async () => {
    const cwd = await tempDir('tasklane-config-');
    await writeFile(join(cwd, 'bad.yaml'), 'stepTimeout: 10\n', 'utf8');

    await expect(loadConfig({ cwd, configPath: 'bad.yaml', env: {} })).rejects.toThrow(`Invalid config ${join(cwd, 'bad.yaml')}: (root): `);
    await expect(loadConfig({ cwd, configPath: 'none.yaml', env: {} })).rejects.toThrow(`Cannot read config ${join(cwd, 'none.yaml')}`);

    await writeFile(join(cwd, 'slow.yaml'), 'stepTimeoutMs: 3000000000\n', 'utf8');
    await expect(loadConfig({ cwd, configPath: 'slow.yaml', env: {} })).rejects.toThrow(
      `Invalid config ${join(cwd, 'slow.yaml')}: stepTimeoutMs: Number must be less than or equal to 2147483647`
    );
  });
});

describe('resolveStepTimeoutMs', () => {
  it('falls back for unset, non-numeric or negative values', () => {
    expect(resolveStepTimeoutMs(undefined)).toBe(120_000);
    expect(resolveStepTimeoutMs('  ', 7000)).toBe(7000);
    expect(resolveStepTimeoutMs('soon', 7000)).toBe(7000);
    expect(resolveStepTimeoutMs('-5', 7000)).toBe(7000);
  });

  it('keeps 0, clamps small values to 1s and floors decimals', () => {
    expect(resolveStepTimeoutMs('0')).toBe(0);
    expect(resolveStepTimeoutMs('250')).toBe(1000);
    expect(resolveStepTimeoutMs('45000.9')).toBe(45_000);
  });

  it('caps values beyond the largest timer delay', () => {
    expect(resolveStepTimeoutMs('3000000000')).toBe(2_147_483_647);
    expect(resolveStepTimeoutMs('2147483647')).toBe(2_147_483_647);
  });
});

describe('resolveLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(resolveLogLevel(' Warn ')).toBe('warn');
    expect(resolveLogLevel('loud')).toBeUndefined();
    expect(resolveLogLevel(undefined)).toBeUndefined();
  });
});
