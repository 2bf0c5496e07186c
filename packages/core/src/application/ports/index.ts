// Transport ports
export type { INodeTransport, TransportResponse } from './INodeTransport.ts';
export { RPC_STATUS_OK, RPC_STATUS_BUSY } from './INodeTransport.ts';

// Guard ports
export type { IExclusiveGuard } from './IExclusiveGuard.ts';

// Proxy ports
export type { INodeRpcProxy, NodeCacheStats } from './INodeRpcProxy.ts';

// Logger ports
export type { ILogger, LogContext } from './ILogger.ts';
export { LOG_LEVEL_VALUES } from './ILogger.ts';
