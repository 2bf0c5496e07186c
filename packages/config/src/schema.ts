import { z } from 'zod';
import { DEFAULT_CACHE_CONFIG } from './defaults.ts';

// ============================================================================
// Node Connection Schema
// ============================================================================

const nodeConnectionConfigSchema = z.object({
  url: z.string().url(),
  /** Per-call timeout, bounded so no call blocks indefinitely */
  timeoutMs: z.number().positive().int().max(3_600_000).optional(),
});

// ============================================================================
// Cache Configuration Schema
// ============================================================================

const cacheConfigSchema = z.object({
  infoTtlMs: z.number().nonnegative().int().optional(),
  heightTtlMs: z.number().nonnegative().int().optional(),
});

// ============================================================================
// Logging Configuration Schema
// ============================================================================

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

const loggingConfigSchema = z.object({
  level: logLevelSchema,
  timestamps: z.boolean().optional(),
  json: z.boolean().optional(),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const nodeProxyConfigSchema = z
  .object({
    node: nodeConnectionConfigSchema,
    offline: z.boolean().optional(),
    cache: cacheConfigSchema.optional(),
    logging: loggingConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    // The fast path must never outlive the snapshot it is refreshed from
    const infoTtl = config.cache?.infoTtlMs ?? DEFAULT_CACHE_CONFIG.infoTtlMs;
    const heightTtl = config.cache?.heightTtlMs ?? DEFAULT_CACHE_CONFIG.heightTtlMs;
    if (heightTtl > infoTtl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `heightTtlMs (${heightTtl}) must not exceed infoTtlMs (${infoTtl})`,
        path: ['cache', 'heightTtlMs'],
      });
    }
  });

export type NodeProxyConfigInput = z.input<typeof nodeProxyConfigSchema>;
export type NodeProxyConfigOutput = z.output<typeof nodeProxyConfigSchema>;

// Export individual schemas for reuse
export {
  nodeConnectionConfigSchema,
  cacheConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
};
