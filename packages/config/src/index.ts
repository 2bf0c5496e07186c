// Types
export type {
  NodeConnectionConfig,
  CacheConfig,
  LoggingConfig,
  LogLevel,
  NodeProxyConfig,
  ResolvedNodeProxyConfig,
} from './types.ts';

// Schema exports
export {
  nodeProxyConfigSchema,
  nodeConnectionConfigSchema,
  cacheConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
} from './schema.ts';
export type { NodeProxyConfigInput, NodeProxyConfigOutput } from './schema.ts';

// Loader exports
export { loadConfig, parseConfig, resolveConfig, defineConfig } from './loader.ts';

// Default exports
export {
  DEFAULT_RPC_TIMEOUT_MS,
  DEFAULT_NODE_CONFIG,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_LOGGING_CONFIG,
} from './defaults.ts';
