/**
 * Executor configuration, validated with zod.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export const externalToolConfigSchema = z.object({
  command: z.string().min(1).default('deck'),
  token: z.string().min(1).optional(),
  address: z.string().url().optional(),
});

export const executorConfigSchema = z.object({
  dryRun: z.boolean().default(false),
  mode: z.enum(['apply', 'sync']).optional(),
  planBaseDir: z.string().min(1).optional(),
  logLevel: logLevelSchema.default('warn'),
  externalTool: externalToolConfigSchema.default({}),
});

export type ExecutorConfig = z.infer<typeof executorConfigSchema>;
export type ExecutorConfigInput = z.input<typeof executorConfigSchema>;

export function parseExecutorConfig(input: unknown = {}): ExecutorConfig {
  const parsed = executorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`invalid executor configuration: ${issues}`);
  }
  return parsed.data;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

/**
 * Builds configuration from `RESCTL_*` environment variables. Unset
 * variables fall back to schema defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ExecutorConfig {
  const input: Record<string, unknown> = {};
  const externalTool: Record<string, unknown> = {};

  if (env.RESCTL_DRY_RUN !== undefined) {
    input.dryRun = TRUE_VALUES.has(env.RESCTL_DRY_RUN.trim().toLowerCase());
  }
  if (env.RESCTL_MODE) {
    input.mode = env.RESCTL_MODE.trim();
  }
  if (env.RESCTL_LOG_LEVEL) {
    input.logLevel = env.RESCTL_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.RESCTL_PLAN_BASE_DIR) {
    input.planBaseDir = env.RESCTL_PLAN_BASE_DIR;
  }
  if (env.RESCTL_DECK_COMMAND) {
    externalTool.command = env.RESCTL_DECK_COMMAND;
  }
  if (env.RESCTL_KONNECT_TOKEN) {
    externalTool.token = env.RESCTL_KONNECT_TOKEN;
  }
  if (env.RESCTL_KONNECT_ADDRESS) {
    externalTool.address = env.RESCTL_KONNECT_ADDRESS;
  }
  input.externalTool = externalTool;

  return parseExecutorConfig(input);
}
