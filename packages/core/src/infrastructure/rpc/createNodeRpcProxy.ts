import type { ResolvedNodeProxyConfig } from '@noderpc/config';
import type { ILogger } from '../../application/ports/ILogger.ts';
import type { IExclusiveGuard } from '../../application/ports/IExclusiveGuard.ts';
import type { INodeTransport } from '../../application/ports/INodeTransport.ts';
import { createLogger } from '../logging/Logger.ts';
import { JsonRpcTransport } from './JsonRpcTransport.ts';
import { NodeRpcProxy } from './NodeRpcProxy.ts';

/**
 * Build a proxy for one session from resolved configuration
 *
 * Without an injected logger, one is created from `config.logging`.
 */
export function createNodeRpcProxy(
  config: ResolvedNodeProxyConfig,
  options?: {
    /** Use this logger instead of one built from `config.logging` */
    logger?: ILogger;
    /** Share an existing guard with other users of the node */
    guard?: IExclusiveGuard;
    /** Replace the HTTP transport (e.g. in tests) */
    transport?: INodeTransport;
  }
): NodeRpcProxy {
  const logger = (options?.logger ?? createLogger(config.logging)).child({ node: config.node.url });
  const transport =
    options?.transport ??
    new JsonRpcTransport({ url: config.node.url, timeout: config.node.timeoutMs, logger });

  return new NodeRpcProxy({
    transport,
    guard: options?.guard,
    offline: config.offline,
    logger,
    infoTtlMs: config.cache.infoTtlMs,
    heightTtlMs: config.cache.heightTtlMs,
  });
}
