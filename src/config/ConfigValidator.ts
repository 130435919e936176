// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

// Access token issued to the user (the two opaque credentials)
const CredentialsSchema = z.object({
  accessTokenKey: z.string().min(1, 'accessTokenKey is required'),
  accessTokenSecret: z.string().min(1, 'accessTokenSecret is required'),
});

// Application credentials
const ConsumerSchema = z.object({
  consumerKey: z.string().min(1, 'consumerKey is required'),
  consumerSecret: z.string().min(1, 'consumerSecret is required'),
});

// HTTP Configuration Schema
const HttpConfigSchema = z
  .object({
    timeout: z.number().int().positive().optional(),
    userAgent: z.string().min(1).optional(),
  })
  .optional();

// Share resolution Configuration Schema
const SharesConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  credentials: CredentialsSchema,
  consumer: ConsumerSchema,
  http: HttpConfigSchema,
  shares: SharesConfigSchema,
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type ValidatedConfig = z.infer<typeof InitConfigSchema>;

/**
 * Fills in the consumer credentials from TWITTER_CONSUMER_KEY and
 * TWITTER_CONSUMER_SECRET when the config leaves them out
 */
export function withEnvDefaults(
  config: unknown,
  env: NodeJS.ProcessEnv = process.env
): unknown {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return config;
  }
  if ('consumer' in config && config.consumer !== undefined) {
    return config;
  }
  return {
    ...config,
    consumer: {
      consumerKey: env.TWITTER_CONSUMER_KEY ?? '',
      consumerSecret: env.TWITTER_CONSUMER_SECRET ?? '',
    },
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate source configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {ConfigError} If configuration is invalid, with one `path: message` line per issue
 */
export function validateConfig(config: unknown): ValidatedConfig {
  const result = InitConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(config: unknown) {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: formatIssues(result.error),
  };
}
