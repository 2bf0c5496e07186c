import type { CacheConfig, LoggingConfig, NodeConnectionConfig } from './types.ts';

// ============================================================================
// Default Node Connection
// ============================================================================

/**
 * Per-call timeout: three and a half minutes
 */
export const DEFAULT_RPC_TIMEOUT_MS = 210_000;

export const DEFAULT_NODE_CONFIG: Required<NodeConnectionConfig> = {
  url: 'http://127.0.0.1:18081',
  timeoutMs: DEFAULT_RPC_TIMEOUT_MS,
};

// ============================================================================
// Default Cache Configuration
// ============================================================================

export const DEFAULT_CACHE_CONFIG: Required<CacheConfig> = {
  infoTtlMs: 30_000,
  heightTtlMs: 30_000,
};

// ============================================================================
// Default Logging Configuration
// ============================================================================

export const DEFAULT_LOGGING_CONFIG: Required<LoggingConfig> = {
  level: 'info',
  timestamps: true,
  json: false,
};
