/**
 * Zod schema for taskloop configuration.
 *
 * Validates config assembled from defaults, a YAML/JSON file, TASKLOOP_*
 * environment variables and explicit overrides.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const TimeoutsConfigSchema = z.object({
  /** Gate timeout for every kind except free-text input */
  defaultSeconds: z.number().positive().default(30),
  inputSeconds: z.number().positive().default(60),
});

export const TaskloopConfigSchema = z.object({
  maxIterations: z.number().int().nonnegative().default(10),
  /** Forwarded to the reasoning provider, unused by the core */
  thinkingDepth: z.number().int().positive().default(3),
  interactive: z.boolean().default(false),
  autoApprove: z.boolean().default(false),
  approvalGate: z.boolean().default(true),
  validationGate: z.boolean().default(true),
  /** Plan guidance every N iterations; 0 only asks once before the first */
  guidanceInterval: z.number().int().nonnegative().default(3),
  timeouts: TimeoutsConfigSchema.default({}),
  maxInputAttempts: z.number().int().positive().default(3),
  dependencyPolicy: z.enum(['strict', 'lenient']).default('strict'),
  logLevel: LogLevelSchema.default('info'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type TaskloopConfig = z.infer<typeof TaskloopConfigSchema>;
export type TaskloopConfigInput = z.input<typeof TaskloopConfigSchema>;

export const DEFAULT_CONFIG: TaskloopConfig = TaskloopConfigSchema.parse({});
