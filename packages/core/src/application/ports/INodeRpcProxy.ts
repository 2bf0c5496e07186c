import type { HeightSnapshot } from '../../domain/entities/NodeInfo.ts';
import type { ServiceNodeState } from '../../domain/entities/ServiceNode.ts';
import type { ProxyResult } from '../../domain/value-objects/ProxyResult.ts';

/**
 * Cache usage counters
 */
export interface NodeCacheStats {
  /** Accesses answered from the cache */
  hits: number;
  /** Accesses that needed a remote call */
  misses: number;
  /** Remote calls actually issued */
  remoteCalls: number;
  /** Remote calls that failed */
  failures: number;
}

/**
 * Read-through cache over a node's query interface.
 *
 * Every accessor resolves to a value or a failure description and never
 * rejects, except {@link INodeRpcProxy.getHardForkVersion}.
 */
export interface INodeRpcProxy {
  /**
   * Whether the session was created offline
   */
  readonly isOffline: boolean;

  /**
   * Height, target height and block weight limit (refreshed every 30s)
   */
  getInfo(): Promise<ProxyResult<HeightSnapshot>>;

  /**
   * Current chain height
   */
  getHeight(): Promise<ProxyResult<number>>;

  /**
   * Height the node is syncing towards
   */
  getTargetHeight(): Promise<ProxyResult<number>>;

  /**
   * Maximum block weight
   */
  getBlockWeightLimit(): Promise<ProxyResult<number>>;

  /**
   * Node RPC protocol version (fetched once per session)
   */
  getRpcVersion(): Promise<ProxyResult<number>>;

  /**
   * Height at which a protocol version activates (fetched once per version)
   */
  getEarliestHeight(version: number): Promise<ProxyResult<number>>;

  /**
   * Current protocol version, always fetched
   * @throws NodeRpcError when the node cannot answer
   */
  getHardForkVersion(): Promise<number>;

  /**
   * Base fee estimate for the current height and grace-block count
   */
  getDynamicBaseFeeEstimate(graceBlocks: number): Promise<ProxyResult<number>>;

  /**
   * Fee quantization mask for the current height; never zero
   */
  getFeeQuantizationMask(): Promise<ProxyResult<number>>;

  /**
   * Registry entries for the given public keys, always fetched
   */
  getServiceNodes(publicKeys: readonly string[]): Promise<ProxyResult<readonly ServiceNodeState[]>>;

  /**
   * Full registry, refreshed when the chain height changes
   */
  getAllServiceNodes(): Promise<ProxyResult<readonly ServiceNodeState[]>>;

  /**
   * Record a height learned elsewhere (e.g. from a block notification)
   */
  setHeight(height: number): void;

  /**
   * Clear every cached field (e.g. when switching nodes)
   */
  reset(): void;

  /**
   * Get cache statistics
   */
  getCacheStats(): NodeCacheStats & { hitRate: number };
}
