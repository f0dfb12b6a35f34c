// src/config/ConfigValidator.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';
import { DEFAULT_STATE_PATH } from '../core/checkpoint/CheckpointStore';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['json', 'pretty'] as const;

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10).default(2),
    baseDelay: z.number().positive().default(500),
    maxDelay: z.number().positive().default(5000),
    retryableStatusCodes: z
      .array(z.number().int().min(100).max(599))
      .default([429, 500, 502, 503, 504]),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

const CircuitBreakerConfigSchema = z.object({
  threshold: z.number().int().positive().default(5),
  resetTimeoutMs: z.number().int().positive().default(60_000),
});

const GitHubSettingsSchema = z.object({
  repo: z
    .string()
    .trim()
    .regex(/^[\w.-]+\/[\w.-]+$/, "GitHub repository must look like 'owner/name'")
    .default('openai/codex'),
  baseBranch: z.string().trim().min(1).default('main'),
  apiUrl: z.string().url().default('https://api.github.com'),
  perPage: z.number().int().min(1).max(100).default(100),
  token: z.string().min(1).optional(),
});

const OpenAISettingsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().trim().min(1).default('gpt-4o-mini'),
  apiUrl: z.string().url().default('https://api.openai.com/v1'),
  summaryLanguage: z.string().trim().min(1).default('English'),
});

// Logger Configuration Schema
const LoggerConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  format: z.enum(LOG_FORMATS).default('json'),
});

// Metrics Configuration Schema
const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  textfilePath: z.string().min(1).optional(),
});

export const SettingsSchema = z
  .object({
    github: GitHubSettingsSchema.default({}),
    openai: OpenAISettingsSchema.default({}),
    discord: z.object({ webhookUrl: z.string().url().optional() }).default({}),
    statePath: z.string().trim().min(1).default(DEFAULT_STATE_PATH),
    dryRun: z.boolean().default(true),
    pollIntervalMinutes: z.number().int().positive().default(10),
    maxNotificationsPerRun: z.number().int().positive().default(5),
    http: z
      .object({
        timeout: z.number().int().positive().default(10_000),
        retry: RetryConfigSchema.default({}),
        circuitBreaker: CircuitBreakerConfigSchema.default({}),
      })
      .default({}),
    logging: LoggerConfigSchema.default({}),
    metrics: MetricsConfigSchema.default({}),
  })
  .refine((settings) => settings.dryRun || settings.discord.webhookUrl !== undefined, {
    message: 'DISCORD_WEBHOOK_URL is required when dry run is disabled',
    path: ['discord', 'webhookUrl'],
  });

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

/** Values given on the command line; they win over the environment */
export interface SettingsOverrides {
  dryRun?: boolean;
  statePath?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Validate settings and return user-friendly errors
 *
 * @throws {ConfigError} listing every `path: message` pair
 */
export function validateSettings(value: unknown): Settings {
  const result = SettingsSchema.safeParse(value);

  if (!result.success) {
    const errors = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }

  return result.data;
}

/**
 * Build settings from environment variables. Reads `.env` first when no
 * explicit environment is passed.
 *
 * @example
 * ```typescript
 * const settings = loadSettings(undefined, { dryRun: false });
 * ```
 */
export function loadSettings(env?: Env, overrides: SettingsOverrides = {}): Settings {
  let source: Env;
  if (env === undefined) {
    dotenv.config();
    source = process.env;
  } else {
    source = env;
  }

  const read = (name: string): string | undefined => {
    const value = source[name]?.trim();
    return value ? value : undefined;
  };

  const input: SettingsInput = {
    github: {
      repo: read('HERALD_GITHUB_REPO'),
      baseBranch: read('HERALD_GITHUB_BASE_BRANCH'),
      apiUrl: read('HERALD_GITHUB_API_URL'),
      perPage: readPositiveInt('HERALD_GITHUB_PER_PAGE', read('HERALD_GITHUB_PER_PAGE')),
      token: read('GITHUB_TOKEN'),
    },
    openai: {
      apiKey: read('OPENAI_API_KEY'),
      model: read('HERALD_OPENAI_MODEL'),
      apiUrl: read('HERALD_OPENAI_API_URL'),
      summaryLanguage: read('HERALD_SUMMARY_LANGUAGE'),
    },
    discord: {
      webhookUrl: read('DISCORD_WEBHOOK_URL'),
    },
    statePath: overrides.statePath ?? read('HERALD_STATE_PATH'),
    dryRun: overrides.dryRun ?? readBool('HERALD_DRY_RUN', read('HERALD_DRY_RUN')),
    pollIntervalMinutes: readPositiveInt(
      'HERALD_POLL_INTERVAL_MINUTES',
      read('HERALD_POLL_INTERVAL_MINUTES')
    ),
    maxNotificationsPerRun: readPositiveInt(
      'HERALD_MAX_NOTIFICATIONS_PER_RUN',
      read('HERALD_MAX_NOTIFICATIONS_PER_RUN')
    ),
    http: {
      timeout: readPositiveInt('HERALD_HTTP_TIMEOUT_MS', read('HERALD_HTTP_TIMEOUT_MS')),
      circuitBreaker: {
        threshold: readPositiveInt(
          'HERALD_CIRCUIT_BREAKER_THRESHOLD',
          read('HERALD_CIRCUIT_BREAKER_THRESHOLD')
        ),
        resetTimeoutMs: readPositiveInt(
          'HERALD_CIRCUIT_BREAKER_RESET_MS',
          read('HERALD_CIRCUIT_BREAKER_RESET_MS')
        ),
      },
    },
    logging: {
      level: readEnum('HERALD_LOG_LEVEL', read('HERALD_LOG_LEVEL'), LOG_LEVELS),
      format: readEnum('HERALD_LOG_FORMAT', read('HERALD_LOG_FORMAT'), LOG_FORMATS),
    },
    metrics: {
      textfilePath: read('HERALD_METRICS_FILE'),
    },
  };

  return validateSettings(input);
}

function readBool(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;

  const lowered = raw.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new ConfigError(`Invalid boolean value for ${name}: ${JSON.stringify(raw)}`, { name });
}

function readPositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;

  if (!/^[+-]?\d+$/.test(raw)) {
    throw new ConfigError(`Invalid integer value for ${name}: ${JSON.stringify(raw)}`, { name });
  }
  const parsed = Number(raw);
  if (parsed <= 0) {
    throw new ConfigError(`${name} must be greater than 0: ${JSON.stringify(raw)}`, { name });
  }
  return parsed;
}

function readEnum<T extends string>(
  name: string,
  raw: string | undefined,
  options: readonly T[]
): T | undefined {
  if (raw === undefined) return undefined;

  const lowered = raw.toLowerCase();
  const match = options.find((option) => option === lowered);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid value for ${name}: ${JSON.stringify(raw)} (expected ${options.join(', ')})`,
      { name }
    );
  }
  return match;
}
