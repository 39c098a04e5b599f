import { z } from 'zod';

import { Logger } from './utils/logger.js';

export const AI_PROVIDERS = ['openai', 'openrouter', 'xai'] as const;
export type AIProviderName = (typeof AI_PROVIDERS)[number];

/**
 * ServiceConfig Schema
 *
 * One immutable object built at startup and handed to the generation adapter,
 * the task engine and the HTTP server. Nothing reads process.env after this.
 */
export const ServiceConfigSchema = z.object({
  server: z.object({
    port: z.number().int().nonnegative().default(3000),
    host: z.string().default('0.0.0.0'),
    baseUrl: z.string().optional(),
  }).default({}),

  a2a: z.object({
    path: z.string().default('/a2a'),
  }).default({}),

  logging: z.object({
    enabled: z.boolean().default(true),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    structured: z.boolean().default(false),
  }).default({}),

  ai: z.object({
    provider: z.enum(AI_PROVIDERS).default('openai'),
    model: z.string().optional(),
    openaiApiKey: z.string().optional(),
    openRouterApiKey: z.string().optional(),
    xaiApiKey: z.string().optional(),
  }).default({}),

  // Retry, timeout and fallback policy of the generation adapter
  generation: z.object({
    maxRetries: z.number().int().min(0).max(5).default(2),
    attemptTimeoutMs: z.number().int().positive().default(10_000),
    initialBackoffMs: z.number().int().nonnegative().default(500),
    backoffMultiplier: z.number().min(1).default(3),
    maxBackoffMs: z.number().int().nonnegative().default(5_000),
    maxTopicLength: z.number().int().positive().default(200),
    fallbackEnabled: z.boolean().default(true),
  }).default({}),

  tasks: z.object({
    gracePeriodMs: z.number().int().nonnegative().default(60_000),
    sweepIntervalMs: z.number().int().positive().default(15_000),
    eventBufferSize: z.number().int().positive().default(16),
    // Swept ids remembered so they are refused on resubmission
    retiredIdHistory: z.number().int().nonnegative().default(10_000),
  }).default({}),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type ServiceConfigInput = z.input<typeof ServiceConfigSchema>;
export type GenerationConfig = ServiceConfig['generation'];
export type TaskRetentionConfig = ServiceConfig['tasks'];

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a config shape and applies defaults. Each issue is logged before throwing.
 */
export function parseServiceConfig(raw: unknown): Readonly<ServiceConfig> {
  const result = ServiceConfigSchema.safeParse(raw);
  if (!result.success) {
    const logger = Logger.getInstance('Config');
    logger.error('Configuration validation failed');
    for (const issue of result.error.issues) {
      logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid configuration');
  }
  return deepFreeze(result.data);
}

/**
 * Reads the service configuration from environment variables
 */
export function loadServiceConfig(env: Env = process.env): Readonly<ServiceConfig> {
  return parseServiceConfig({
    server: {
      port: parseNumber(env['PORT']),
      host: env['HOST'],
      baseUrl: env['BASE_URL'],
    },
    a2a: {
      path: env['A2A_PATH'],
    },
    logging: {
      enabled: parseBoolean(env['LOG_ENABLED']),
      level: env['LOG_LEVEL']?.toLowerCase(),
      structured: parseBoolean(env['LOG_STRUCTURED']),
    },
    ai: {
      provider: env['AI_PROVIDER']?.toLowerCase(),
      model: env['AI_MODEL'] ?? env['OPENAI_MODEL'],
      openaiApiKey: env['OPENAI_API_KEY'],
      openRouterApiKey: env['OPENROUTER_API_KEY'],
      xaiApiKey: env['XAI_API_KEY'],
    },
    generation: {
      maxRetries: parseNumber(env['GENERATION_MAX_RETRIES']),
      attemptTimeoutMs: parseNumber(env['GENERATION_ATTEMPT_TIMEOUT_MS']),
      initialBackoffMs: parseNumber(env['GENERATION_INITIAL_BACKOFF_MS']),
      backoffMultiplier: parseNumber(env['GENERATION_BACKOFF_MULTIPLIER']),
      maxBackoffMs: parseNumber(env['GENERATION_MAX_BACKOFF_MS']),
      maxTopicLength: parseNumber(env['GENERATION_MAX_TOPIC_LENGTH']),
      fallbackEnabled: parseBoolean(env['GENERATION_FALLBACK_ENABLED']),
    },
    tasks: {
      gracePeriodMs: parseNumber(env['TASK_GRACE_PERIOD_MS']),
      sweepIntervalMs: parseNumber(env['TASK_SWEEP_INTERVAL_MS']),
      eventBufferSize: parseNumber(env['TASK_EVENT_BUFFER_SIZE']),
      retiredIdHistory: parseNumber(env['TASK_RETIRED_ID_HISTORY']),
    },
  });
}
