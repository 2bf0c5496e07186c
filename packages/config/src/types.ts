// ============================================================================
// Node Connection Configuration
// ============================================================================

/**
 * Remote node connection
 */
export interface NodeConnectionConfig {
  /** Base URL of the node's RPC server; requests go to `<url>/json_rpc` */
  url: string;
  /** Per-call timeout in milliseconds (default: 210000) */
  timeoutMs?: number;
}

// ============================================================================
// Cache Configuration
// ============================================================================

/**
 * Freshness windows for the time-based cache fields
 */
export interface CacheConfig {
  /** How long a node info snapshot stays fresh (default: 30000) */
  infoTtlMs?: number;
  /** How long the fast-path height stays fresh (default: 30000) */
  heightTtlMs?: number;
}

// ============================================================================
// Logging Configuration
// ============================================================================

/**
 * Log levels from least to most verbose
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Logging configuration
 */
export interface LoggingConfig {
  /** Minimum log level */
  level: LogLevel;
  /** Show timestamps (default: true) */
  timestamps?: boolean;
  /** JSON format for structured logging */
  json?: boolean;
}

// ============================================================================
// Main Configuration
// ============================================================================

/**
 * Complete node proxy configuration
 */
export interface NodeProxyConfig {
  /** Node connection */
  node: NodeConnectionConfig;
  /**
   * Offline sessions never touch the network.
   * Fixed for the lifetime of a proxy.
   */
  offline?: boolean;
  /** Cache freshness windows */
  cache?: CacheConfig;
  /** Logging configuration */
  logging?: LoggingConfig;
}

/**
 * Configuration with every default applied
 */
export interface ResolvedNodeProxyConfig {
  node: Required<NodeConnectionConfig>;
  offline: boolean;
  cache: Required<CacheConfig>;
  logging: Required<LoggingConfig>;
}
