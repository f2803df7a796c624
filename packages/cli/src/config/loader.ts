/**
 * Configuration
 *
 * JSON file merged over defaults, then environment overrides, validated
 * with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { pino } from 'pino';
import { z } from 'zod';

const logger = pino({ name: 'config', level: process.env.LOG_LEVEL ?? 'info' });

export const DEFAULT_CONFIG_FILE = 'stop-loss.config.json';

const configSchema = z.object({
  tickers: z.array(z.string().trim().min(1)).default([]),
  stopLossPercentage: z.number().min(0).max(100).default(5),
  trailingEnabled: z.boolean().default(false),
  atrPeriod: z.number().int().positive().default(14),
  atrMultiplier: z.number().positive().default(2),
  trailingLookbackDays: z.number().int().positive().default(90),
  databaseUrl: z.string().min(1).default('postgresql://localhost:5432/stop_loss'),
});

// An exported but empty variable counts as unset
const unsetIfBlank = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z.object({
  DATABASE_URL: z.preprocess(unsetIfBlank, z.string().min(1).optional()),
  STOP_LOSS_PERCENTAGE: z.preprocess(unsetIfBlank, z.coerce.number().min(0).max(100).optional()),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  readonly code = 'config' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit file; when missing this is an error */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function readConfigFile(path: string, explicit: boolean): unknown {
  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    logger.debug({ path }, 'No config file, using defaults');
    return {};
  }

  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file ${path}: ${reason}`, { cause: error });
  }
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path !== undefined;
  const path = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);

  const parsed = configSchema.safeParse(readConfigFile(path, explicit));
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`);
  }

  const env = envSchema.safeParse(options.env ?? process.env);
  if (!env.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(env.error)}`);
  }

  return {
    ...parsed.data,
    databaseUrl: env.data.DATABASE_URL ?? parsed.data.databaseUrl,
    stopLossPercentage: env.data.STOP_LOSS_PERCENTAGE ?? parsed.data.stopLossPercentage,
  };
}
