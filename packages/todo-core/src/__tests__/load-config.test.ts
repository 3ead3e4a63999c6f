import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CONFIG } from '@taskloop/todo-contracts';
import { configFromEnv, loadConfig, parseConfig, renderConfigYaml } from '../config/load-config.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskloop-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(text: string): Promise<string> {
    const file = join(dir, 'taskloop.yaml');
    await writeFile(file, text, 'utf8');
    return file;
  }

  it('returns the defaults with no sources', async () => {
    expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('layers file, environment and overrides', async () => {
    const file = await writeConfig('maxIterations: 5\ninteractive: true\ntimeouts:\n  defaultSeconds: 10\n');

    const config = await loadConfig({
      file,
      env: { TASKLOOP_MAX_ITERATIONS: '7', TASKLOOP_INPUT_TIMEOUT_SECONDS: '90' },
      overrides: { interactive: false },
    });

    expect(config.maxIterations).toBe(7);
    expect(config.interactive).toBe(false);
    expect(config.timeouts).toEqual({ defaultSeconds: 10, inputSeconds: 90 });
  });

  it('treats an empty file as no settings', async () => {
    const file = await writeConfig('');
    expect(await loadConfig({ file })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects a file that is not a mapping', async () => {
    const file = await writeConfig('- a\n- b\n');
    await expect(loadConfig({ file })).rejects.toThrow(
      `Invalid configuration in ${file}: expected a mapping at the top level`,
    );
  });

  it('reports a missing file as a ConfigError', async () => {
    const attempt = loadConfig({ file: join(dir, 'missing.yaml') });
    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toThrow(/cannot read file/);
  });

  it('reports schema issues with their paths', async () => {
    const attempt = loadConfig({ env: { TASKLOOP_MAX_ITERATIONS: 'many' } });
    await expect(attempt).rejects.toMatchObject({ code: 'CONFIG', issues: [{ path: 'maxIterations' }] });
  });
});

describe('configFromEnv', () => {
  it('coerces known variables and ignores the rest', () => {
    expect(
      configFromEnv({
        TASKLOOP_INTERACTIVE: 'yes',
        TASKLOOP_AUTO_APPROVE: 'OFF',
        TASKLOOP_GUIDANCE_INTERVAL: ' 0 ',
        TASKLOOP_LOG_LEVEL: 'debug',
        TASKLOOP_THINKING_DEPTH: '',
        HOME: '/home/test',
      }),
    ).toEqual({ interactive: true, autoApprove: false, guidanceInterval: 0, logLevel: 'debug' });
  });

  it('nests timeout variables', () => {
    expect(configFromEnv({ TASKLOOP_TIMEOUT_SECONDS: '5', TASKLOOP_INPUT_TIMEOUT_SECONDS: '15' })).toEqual({
      timeouts: { defaultSeconds: 5, inputSeconds: 15 },
    });
  });
});

describe('parseConfig', () => {
  it('joins nested issue paths with dots', () => {
    try {
      parseConfig({ timeouts: { defaultSeconds: -1 } }, 'inline');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map((issue) => issue.path)).toEqual(['timeouts.defaultSeconds']);
        expect(error.message.startsWith('Invalid configuration in inline: timeouts.defaultSeconds: ')).toBe(true);
      }
    }
  });

  it('renders the config as YAML', () => {
    const yaml = renderConfigYaml({ ...DEFAULT_CONFIG, maxIterations: 4 });
    expect(yaml.startsWith('maxIterations: 4\n')).toBe(true);
  });
});
