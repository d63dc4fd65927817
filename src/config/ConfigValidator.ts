// src/config/ConfigValidator.ts

import { z } from 'zod';

export const INVENTORY_SOURCES = ['lf-energy-landscape', 'opensustain-tech', 'g-pst'] as const;
export const PACKAGE_REGISTRIES = ['pypi', 'npm', 'julia', 'conda'] as const;
export const INTERACTION_TYPES = ['stargazer', 'fork', 'issue', 'pull', 'comment'] as const;

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
    retryNetworkErrors: z.boolean().optional(),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

const CacheConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Cache backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    ttl: z.number().positive().optional(),
    namespace: z.string().min(1).optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const InventoryConfigSchema = z.object({
  sources: z.array(z.enum(INVENTORY_SOURCES)).min(1, 'At least one inventory source must be configured'),
  sourceUrls: z.record(z.enum(INVENTORY_SOURCES), z.string().url()).optional(),
  manualListPath: z.string().min(1),
  exclusionsPath: z.string().min(1),
});

const EnrichmentConfigSchema = z.object({
  concurrency: z.number().int().positive().max(64),
  probeDocs: z.boolean(),
  registries: z.array(z.enum(PACKAGE_REGISTRIES)),
});

const CollectorConfigSchema = z.object({
  interactionTypes: z.array(z.enum(INTERACTION_TYPES)).min(1),
  maxQuotaWaitMs: z.number().int().min(0),
  perPage: z.number().int().min(1).max(100).optional(),
});

const GeocodingConfigSchema = z
  .object({
    enabled: z.boolean(),
    url: z.string().url().optional(),
  })
  .optional();

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    prefix: z.string().optional(),
  })
  .optional();

// Complete Pipeline Configuration Schema
export const PipelineConfigSchema = z.object({
  dataDir: z.string().min(1),
  rulesPath: z.string().min(1),
  github: z.object({
    token: z.string().min(1).optional(),
  }),
  inventory: InventoryConfigSchema,
  enrichment: EnrichmentConfigSchema,
  collector: CollectorConfigSchema,
  geocoding: GeocodingConfigSchema,
  http: z.object({
    timeout: z.number().positive().optional(),
    userAgent: z.string().min(1).optional(),
    keepAlive: z.boolean().optional(),
    retry: RetryConfigSchema,
  }),
  rateLimits: z.record(z.enum(['github', 'ecosystems', 'registry', 'docs', 'inventory', 'geocoder']), RateLimitConfigSchema),
  cache: CacheConfigSchema.optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type InventorySourceName = (typeof INVENTORY_SOURCES)[number];
export type PackageRegistry = (typeof PACKAGE_REGISTRIES)[number];
export type InteractionType = (typeof INTERACTION_TYPES)[number];

/**
 * Validate pipeline configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration (same object, but type-guaranteed)
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): PipelineConfig {
  return PipelineConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: PipelineConfig } | { success: false; errors: string[] } {
  const result = PipelineConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
