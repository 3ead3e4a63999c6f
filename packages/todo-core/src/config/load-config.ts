/**
 * @module @taskloop/todo-core/config/load-config
 * Assembles TaskloopConfig from layered sources.
 *
 * Precedence, lowest first: schema defaults, config file (YAML or JSON),
 * TASKLOOP_* environment variables, explicit overrides.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ file: 'taskloop.yaml', env: process.env, overrides: { interactive: true } });
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse, stringify } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigError, TaskloopConfigSchema, errorMessage } from '@taskloop/todo-contracts';
import type { TaskloopConfig, TaskloopConfigInput } from '@taskloop/todo-contracts';

export interface LoadConfigOptions {
  file?: string;
  env?: Record<string, string | undefined>;
  overrides?: TaskloopConfigInput;
}

type EnvValueKind = 'number' | 'boolean' | 'string';

/** Environment variable → dotted config path */
export const ENV_MAPPING: Record<string, { path: string[]; kind: EnvValueKind }> = {
  TASKLOOP_MAX_ITERATIONS: { path: ['maxIterations'], kind: 'number' },
  TASKLOOP_THINKING_DEPTH: { path: ['thinkingDepth'], kind: 'number' },
  TASKLOOP_INTERACTIVE: { path: ['interactive'], kind: 'boolean' },
  TASKLOOP_AUTO_APPROVE: { path: ['autoApprove'], kind: 'boolean' },
  TASKLOOP_APPROVAL_GATE: { path: ['approvalGate'], kind: 'boolean' },
  TASKLOOP_VALIDATION_GATE: { path: ['validationGate'], kind: 'boolean' },
  TASKLOOP_GUIDANCE_INTERVAL: { path: ['guidanceInterval'], kind: 'number' },
  TASKLOOP_TIMEOUT_SECONDS: { path: ['timeouts', 'defaultSeconds'], kind: 'number' },
  TASKLOOP_INPUT_TIMEOUT_SECONDS: { path: ['timeouts', 'inputSeconds'], kind: 'number' },
  TASKLOOP_MAX_INPUT_ATTEMPTS: { path: ['maxInputAttempts'], kind: 'number' },
  TASKLOOP_DEPENDENCY_POLICY: { path: ['dependencyPolicy'], kind: 'string' },
  TASKLOOP_LOG_LEVEL: { path: ['logLevel'], kind: 'string' },
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TaskloopConfig> {
  let merged: Record<string, unknown> = {};

  if (options.file) {
    merged = deepMerge(merged, await readConfigFile(options.file));
  }
  if (options.env) {
    merged = deepMerge(merged, configFromEnv(options.env));
  }
  if (options.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return parseConfig(merged, options.file);
}

/**
 * @throws ConfigError listing every schema issue
 */
export function parseConfig(input: unknown, source?: string): TaskloopConfig {
  const parsed = TaskloopConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigError(parsed.error, source);
  }
  return parsed.data;
}

export function configFromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  let config: Record<string, unknown> = {};

  for (const [name, { path, kind }] of Object.entries(ENV_MAPPING)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    config = deepMerge(config, nest(path, coerce(raw.trim(), kind)));
  }

  return config;
}

export function renderConfigYaml(config: TaskloopConfig): string {
  return stringify(config);
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError([{ path: '', message: `cannot read file: ${errorMessage(error)}` }], file);
  }

  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    throw new ConfigError([{ path: '', message: `cannot parse file: ${errorMessage(error)}` }], file);
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (!isPlainObject(data)) {
    throw new ConfigError([{ path: '', message: 'expected a mapping at the top level' }], file);
  }
  return data;
}

/** Unparseable values are passed through so the schema reports them */
function coerce(raw: string, kind: EnvValueKind): unknown {
  if (kind === 'number') {
    const value = Number(raw);
    return Number.isNaN(value) ? raw : value;
  }
  if (kind === 'boolean') {
    const lower = raw.toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(lower)) {
      return true;
    }
    if (['false', '0', 'no', 'off'].includes(lower)) {
      return false;
    }
    return raw;
  }
  return raw;
}

function nest(path: string[], value: unknown): Record<string, unknown> {
  const [head, ...rest] = path;
  if (head === undefined) {
    return {};
  }
  return { [head]: rest.length === 0 ? value : nest(rest, value) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function toConfigError(error: ZodError, source?: string): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    source,
  );
}
