/**
 * Configuration schema for orgview
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';

/**
 * Cache configuration, applied uniformly to every cached operation
 */
export const CacheConfigSchema = z.object({
  /** Seconds before a cached entry expires */
  ttlSeconds: z.number().int().min(1).default(300),
  /** Entries per cache before least-recently-used eviction */
  maxSize: z.number().int().min(1).default(512),
});

/**
 * AWS client configuration, used only when no client is supplied
 */
export const AwsConfigSchema = z.object({
  region: z.string().min(1).optional(),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Complete orgview configuration schema
 */
export const OrgViewConfigSchema = z.object({
  cache: CacheConfigSchema.default({}),
  aws: AwsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

/**
 * Constructor options accepted by OrgView
 */
export const ViewOptionsSchema = z.object({
  cacheTtl: z.number().int().min(1).optional(),
  cacheMaxsize: z.number().int().min(1).optional(),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type AwsConfig = z.infer<typeof AwsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type OrgViewConfig = z.infer<typeof OrgViewConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: OrgViewConfig = OrgViewConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): OrgViewConfig {
  return OrgViewConfigSchema.parse(config);
}

/**
 * Safe validation that returns result object instead of throwing
 */
export function safeValidateConfig(config: unknown): z.SafeParseReturnType<unknown, OrgViewConfig> {
  return OrgViewConfigSchema.safeParse(config);
}
