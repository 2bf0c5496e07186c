import { createJiti } from 'jiti';
import { nodeProxyConfigSchema } from './schema.ts';
import type { NodeProxyConfig, ResolvedNodeProxyConfig } from './types.ts';
import { DEFAULT_CACHE_CONFIG, DEFAULT_LOGGING_CONFIG, DEFAULT_NODE_CONFIG } from './defaults.ts';

/**
 * Configuration file names to search for (in order)
 */
const CONFIG_FILE_NAMES = [
  'noderpc.config.ts',
  'noderpc.config.js',
  'noderpc.config.mts',
  'noderpc.config.mjs',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Find configuration file in the given directory
 */
async function findConfigFile(cwd: string): Promise<string | undefined> {
  const { existsSync } = await import('node:fs');
  const { join } = await import('node:path');

  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = join(cwd, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }

  return undefined;
}

/**
 * Load configuration from a file path
 * Uses jiti to support TypeScript config files
 */
async function loadConfigFile(filePath: string): Promise<unknown> {
  const jiti = createJiti(import.meta.url, {
    interopDefault: true,
  });

  const module: unknown = await jiti.import(filePath);

  // Support both default export and named export
  if (isRecord(module)) {
    return module.default ?? module.config ?? module;
  }
  return module;
}

/**
 * Apply defaults to a validated configuration
 */
export function resolveConfig(config: NodeProxyConfig): ResolvedNodeProxyConfig {
  return {
    node: {
      url: config.node.url,
      timeoutMs: config.node.timeoutMs ?? DEFAULT_NODE_CONFIG.timeoutMs,
    },
    offline: config.offline ?? false,
    cache: {
      infoTtlMs: config.cache?.infoTtlMs ?? DEFAULT_CACHE_CONFIG.infoTtlMs,
      heightTtlMs: config.cache?.heightTtlMs ?? DEFAULT_CACHE_CONFIG.heightTtlMs,
    },
    logging: {
      level: config.logging?.level ?? DEFAULT_LOGGING_CONFIG.level,
      timestamps: config.logging?.timestamps ?? DEFAULT_LOGGING_CONFIG.timestamps,
      json: config.logging?.json ?? DEFAULT_LOGGING_CONFIG.json,
    },
  };
}

/**
 * Validate a raw configuration object and apply defaults
 */
export function parseConfig(rawConfig: unknown): ResolvedNodeProxyConfig {
  const parseResult = nodeProxyConfigSchema.safeParse(rawConfig);
  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return resolveConfig(parseResult.data);
}

/**
 * Load and validate node proxy configuration
 */
export async function loadConfig(options?: {
  /** Custom config file path */
  configPath?: string;
  /** Working directory to search for config (default: process.cwd()) */
  cwd?: string;
}): Promise<ResolvedNodeProxyConfig> {
  const cwd = options?.cwd ?? process.cwd();

  let configPath = options?.configPath;
  if (!configPath) {
    configPath = await findConfigFile(cwd);
    if (!configPath) {
      throw new Error(
        `No configuration file found. Create one of: ${CONFIG_FILE_NAMES.join(', ')}`
      );
    }
  }

  let rawConfig: unknown;
  try {
    rawConfig = await loadConfigFile(configPath);
  } catch (error) {
    throw new Error(
      `Failed to load configuration from ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(rawConfig);
}

/**
 * Create a type-safe configuration helper
 */
export function defineConfig<T extends NodeProxyConfig>(config: T): T {
  return config;
}
