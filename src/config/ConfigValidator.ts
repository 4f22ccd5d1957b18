// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['json', 'pretty'] as const;

// HTTP Configuration Schema
const HttpConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.reddit.com'),
  timeoutMs: z.number().int().positive().default(30000),
});

// Pagination Configuration Schema
const PaginationConfigSchema = z.object({
  pageSize: z
    .number()
    .int()
    .min(1, 'pageSize must be at least 1')
    .max(100, 'pageSize cannot exceed 100 (upstream maximum)')
    .default(100),
});

// Pacing Configuration Schema
const PacingConfigSchema = z
  .object({
    minDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(5000),
    concurrency: z.number().int().min(1).max(10).default(3),
  })
  .refine((data) => data.maxDelayMs >= data.minDelayMs, {
    message: 'maxDelayMs must be greater than or equal to minDelayMs',
  });

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
    format: z.enum(LOG_FORMATS).optional(),
  })
  .optional();

export const ClientConfigSchema = z.object({
  userAgentContact: z.string().min(1).optional(),
  http: HttpConfigSchema.default({}),
  pagination: PaginationConfigSchema.default({}),
  pacing: PacingConfigSchema.default({}),
  logging: LoggerConfigSchema,
});

export type ClientConfig = z.input<typeof ClientConfigSchema>;
export type ResolvedClientConfig = z.output<typeof ClientConfigSchema>;
export type PacingConfig = ResolvedClientConfig['pacing'];

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
}

/**
 * Validate client configuration and fill in defaults.
 *
 * @throws {ConfigError} listing every failed field
 */
export function validateConfig(config: unknown): ResolvedClientConfig {
  const result = ClientConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config ?? {});

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

const EnvSchema = z.object({
  KARMALENS_CONTACT: z.string().min(1).optional(),
  KARMALENS_BASE_URL: z.string().url().optional(),
  KARMALENS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  KARMALENS_PAGE_SIZE: z.coerce.number().int().optional(),
  KARMALENS_MIN_DELAY_MS: z.coerce.number().int().optional(),
  KARMALENS_MAX_DELAY_MS: z.coerce.number().int().optional(),
  KARMALENS_CONCURRENCY: z.coerce.number().int().optional(),
  KARMALENS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  KARMALENS_LOG_FORMAT: z.enum(LOG_FORMATS).optional(),
});

/**
 * Build a client configuration from `KARMALENS_*` environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }
  const vars = parsed.data;

  return validateConfig({
    userAgentContact: vars.KARMALENS_CONTACT,
    http: {
      baseUrl: vars.KARMALENS_BASE_URL,
      timeoutMs: vars.KARMALENS_TIMEOUT_MS,
    },
    pagination: { pageSize: vars.KARMALENS_PAGE_SIZE },
    pacing: {
      minDelayMs: vars.KARMALENS_MIN_DELAY_MS,
      maxDelayMs: vars.KARMALENS_MAX_DELAY_MS,
      concurrency: vars.KARMALENS_CONCURRENCY,
    },
    logging: {
      level: vars.KARMALENS_LOG_LEVEL,
      format: vars.KARMALENS_LOG_FORMAT,
    },
  });
}
