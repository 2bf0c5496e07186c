import type { z } from 'zod';
import { createHeightSnapshot, type HeightSnapshot } from '../../domain/entities/NodeInfo.ts';
import { normalizeQuantizationMask } from '../../domain/entities/FeeEstimate.ts';
import { createServiceNodeState, type ServiceNodeState } from '../../domain/entities/ServiceNode.ts';
import { HardForkVersion } from '../../domain/value-objects/HardForkVersion.ts';
import {
  OFFLINE_FAILURE,
  failure,
  success,
  type ProxyResult,
} from '../../domain/value-objects/ProxyResult.ts';
import { NodeRpcError } from '../../domain/errors/NodeRpcError.ts';
import type { ILogger } from '../../application/ports/ILogger.ts';
import type { IExclusiveGuard } from '../../application/ports/IExclusiveGuard.ts';
import type { INodeRpcProxy, NodeCacheStats } from '../../application/ports/INodeRpcProxy.ts';
import {
  RPC_STATUS_BUSY,
  RPC_STATUS_OK,
  type INodeTransport,
  type TransportResponse,
} from '../../application/ports/INodeTransport.ts';
import { NodeCacheStore, type CachedFeeEstimate, type CachedServiceNodes } from '../../application/services/NodeCacheStore.ts';
import {
  DrivingValuePolicy,
  PopulateOncePolicy,
  TimeToLivePolicy,
} from '../../application/services/FreshnessPolicy.ts';
import { ExclusiveGuard } from '../concurrency/ExclusiveGuard.ts';
import {
  earliestHeightResponseSchema,
  feeEstimateResponseSchema,
  getInfoResponseSchema,
  getVersionResponseSchema,
  hardForkVersionResponseSchema,
  serviceNodesResponseSchema,
  type FeeEstimateResponse,
} from './NodeRpcSchemas.ts';

const DEFAULT_TTL_MS = 30_000;

/**
 * Map a transport outcome onto the failure taxonomy
 */
export function checkResponse(method: string, response: TransportResponse): ProxyResult<unknown> {
  if (!response.ok) {
    return failure({ kind: 'unreachable', method, message: `Failed to connect to node (${method})` });
  }
  // empty status -> no connection
  if (response.status === '') {
    return failure({ kind: 'no_connection', method, message: `No connection to node (${method})` });
  }
  if (response.status === RPC_STATUS_BUSY) {
    return failure({ kind: 'busy', method, message: `Node busy (${method})` });
  }
  if (response.status !== RPC_STATUS_OK) {
    return failure({
      kind: 'rpc_error',
      method,
      message: `Error calling ${method} node RPC: ${response.status}`,
    });
  }
  return success(response.result);
}

/**
 * Read-through cache over a node's query interface
 *
 * Each field has its own freshness rule:
 * - info snapshot and fast-path height: time to live
 * - RPC version and activation heights: populated once
 * - fee estimate, quantization mask and full registry: keyed by chain height
 *
 * Misses take the shared guard and check freshness again before calling
 * out, so callers queued behind the same miss reuse its result.
 */
export class NodeRpcProxy implements INodeRpcProxy {
  readonly isOffline: boolean;

  private readonly transport: INodeTransport;
  private readonly guard: IExclusiveGuard;
  private readonly logger?: ILogger;
  private readonly clock: () => number;
  private readonly store = new NodeCacheStore();
  private stats: NodeCacheStats = { hits: 0, misses: 0, remoteCalls: 0, failures: 0 };

  private readonly infoPolicy: TimeToLivePolicy;
  private readonly heightPolicy: TimeToLivePolicy;
  private readonly populateOnce = new PopulateOncePolicy();
  private readonly feePolicy = new DrivingValuePolicy<CachedFeeEstimate, readonly [number, number]>(
    (entry) => [entry.cachedForHeight, entry.cachedForGraceBlocks]
  );
  private readonly maskPolicy = new DrivingValuePolicy<CachedFeeEstimate, readonly [number]>(
    (entry) => [entry.cachedForHeight]
  );
  private readonly registryPolicy = new DrivingValuePolicy<CachedServiceNodes, readonly [number]>(
    (entry) => [entry.cachedAtHeight]
  );

  constructor(params: {
    transport: INodeTransport;
    /** Shared with other users of the same transport (default: a private guard) */
    guard?: IExclusiveGuard;
    /** Never touch the network (default: false) */
    offline?: boolean;
    logger?: ILogger;
    /** Info snapshot freshness (default: 30s) */
    infoTtlMs?: number;
    /** Fast-path height freshness (default: 30s) */
    heightTtlMs?: number;
    /** Milliseconds since the epoch (default: Date.now) */
    clock?: () => number;
  }) {
    this.transport = params.transport;
    this.guard = params.guard ?? new ExclusiveGuard();
    this.isOffline = params.offline ?? false;
    this.logger = params.logger;
    this.clock = params.clock ?? Date.now;
    this.infoPolicy = new TimeToLivePolicy(params.infoTtlMs ?? DEFAULT_TTL_MS);
    this.heightPolicy = new TimeToLivePolicy(params.heightTtlMs ?? DEFAULT_TTL_MS);
  }

  // ==========================================================================
  // Height / info
  // ==========================================================================

  async getInfo(): Promise<ProxyResult<HeightSnapshot>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    const generation = this.store.generation;

    const cached = this.store.info;
    if (this.infoPolicy.isFresh(cached, this.clock())) {
      this.recordHit('get_info');
      return success(cached.snapshot);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const now = this.clock();
      const current = this.store.info;
      if (this.infoPolicy.isFresh(current, now)) {
        return success(current.snapshot);
      }

      const result = await this.invoke('get_info', undefined, getInfoResponseSchema);
      if (!result.ok) return result;

      const snapshot = createHeightSnapshot(result.value);
      this.store.setInfo(snapshot, now, generation);
      this.logger?.debug('Refreshed node info', {
        module: 'NodeRpcProxy',
        height: snapshot.height,
        targetHeight: snapshot.targetHeight,
      });
      return success(snapshot);
    });
  }

  async getHeight(): Promise<ProxyResult<number>> {
    const cached = this.store.height;
    if (this.heightPolicy.isFresh(cached, this.clock())) {
      this.recordHit('height');
      return success(cached.height);
    }

    const info = await this.getInfo();
    if (!info.ok) return info;
    return success(info.value.height);
  }

  async getTargetHeight(): Promise<ProxyResult<number>> {
    const info = await this.getInfo();
    if (!info.ok) return info;
    return success(info.value.targetHeight);
  }

  async getBlockWeightLimit(): Promise<ProxyResult<number>> {
    const info = await this.getInfo();
    if (!info.ok) return info;
    return success(info.value.blockWeightLimit);
  }

  setHeight(height: number): void {
    this.store.setHeight(height, this.clock());
  }

  // ==========================================================================
  // Versions
  // ==========================================================================

  async getRpcVersion(): Promise<ProxyResult<number>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    const generation = this.store.generation;

    const slot = this.store.rpcVersion;
    if (this.populateOnce.isFresh(slot)) {
      this.recordHit('get_version');
      return success(slot.value);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const current = this.store.rpcVersion;
      if (this.populateOnce.isFresh(current)) {
        return success(current.value);
      }

      const result = await this.invoke('get_version', undefined, getVersionResponseSchema);
      if (!result.ok) return result;

      this.store.setRpcVersion(result.value.version, generation);
      this.logger?.debug(`Node RPC version ${result.value.version}`, { module: 'NodeRpcProxy' });
      return success(result.value.version);
    });
  }

  async getEarliestHeight(version: number): Promise<ProxyResult<number>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    if (!HardForkVersion.isValid(version)) {
      return failure({
        kind: 'rpc_error',
        method: 'hard_fork_info',
        message: `Invalid hard fork version: ${version}`,
      });
    }
    const hardFork = HardForkVersion.from(version);
    const generation = this.store.generation;

    const slot = this.store.earliestHeight(hardFork.value);
    if (this.populateOnce.isFresh(slot)) {
      this.recordHit('hard_fork_info');
      return success(slot.value);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const current = this.store.earliestHeight(hardFork.value);
      if (this.populateOnce.isFresh(current)) {
        return success(current.value);
      }

      const result = await this.invoke(
        'hard_fork_info',
        { version: hardFork.value },
        earliestHeightResponseSchema
      );
      if (!result.ok) return result;

      this.store.setEarliestHeight(hardFork.value, result.value.earliest_height, generation);
      this.logger?.debug(`Activation height of ${hardFork}: ${result.value.earliest_height}`, {
        module: 'NodeRpcProxy',
      });
      return success(result.value.earliest_height);
    });
  }

  async getHardForkVersion(): Promise<number> {
    if (this.isOffline) throw new NodeRpcError(OFFLINE_FAILURE);

    const result = await this.guard.runExclusive(() =>
      this.invoke('hard_fork_info', undefined, hardForkVersionResponseSchema)
    );
    if (!result.ok) {
      this.logger?.error(`Failed to get hard fork status: ${result.failure.message}`, {
        module: 'NodeRpcProxy',
        method: 'hard_fork_info',
      });
      throw new NodeRpcError(result.failure);
    }
    return result.value.version;
  }

  // ==========================================================================
  // Fees
  // ==========================================================================

  async getDynamicBaseFeeEstimate(graceBlocks: number): Promise<ProxyResult<number>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    if (!Number.isSafeInteger(graceBlocks) || graceBlocks < 0) {
      return failure({
        kind: 'rpc_error',
        method: 'get_fee_estimate',
        message: `Invalid grace blocks: ${graceBlocks}`,
      });
    }
    const generation = this.store.generation;

    const heightResult = await this.getHeight();
    if (!heightResult.ok) return heightResult;
    const height = heightResult.value;

    const cached = this.store.feeEstimate;
    if (this.feePolicy.isFresh(cached, [height, graceBlocks])) {
      this.recordHit('get_fee_estimate');
      return success(cached.fee);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const current = this.store.feeEstimate;
      if (this.feePolicy.isFresh(current, [height, graceBlocks])) {
        return success(current.fee);
      }

      const result = await this.fetchFeeEstimate(height, graceBlocks, generation);
      if (!result.ok) return result;
      return success(result.value.fee);
    });
  }

  async getFeeQuantizationMask(): Promise<ProxyResult<number>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    const generation = this.store.generation;

    const heightResult = await this.getHeight();
    if (!heightResult.ok) return heightResult;
    const height = heightResult.value;

    const cached = this.store.feeEstimate;
    if (this.maskPolicy.isFresh(cached, [height])) {
      this.recordHit('get_fee_estimate');
      return success(cached.quantizationMask);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const current = this.store.feeEstimate;
      if (this.maskPolicy.isFresh(current, [height])) {
        return success(current.quantizationMask);
      }

      // Reuse whatever grace-block count the last estimate was fetched for
      const graceBlocks = current?.cachedForGraceBlocks ?? 0;
      const result = await this.fetchFeeEstimate(height, graceBlocks, generation);
      if (!result.ok) return result;
      return success(result.value.quantizationMask);
    });
  }

  /**
   * Fetch and store a fee estimate; caller must hold the guard
   */
  private async fetchFeeEstimate(
    height: number,
    graceBlocks: number,
    generation: number
  ): Promise<ProxyResult<CachedFeeEstimate>> {
    const result = await this.invoke(
      'get_fee_estimate',
      { grace_blocks: graceBlocks },
      feeEstimateResponseSchema
    );
    if (!result.ok) return result;

    const entry: CachedFeeEstimate = {
      fee: result.value.fee,
      quantizationMask: this.checkQuantizationMask(result.value),
      cachedForHeight: height,
      cachedForGraceBlocks: graceBlocks,
    };
    this.store.setFeeEstimate(entry, generation);
    this.logger?.debug('Refreshed fee estimate', {
      module: 'NodeRpcProxy',
      height,
      graceBlocks,
      fee: entry.fee,
    });
    return success(entry);
  }

  private checkQuantizationMask(response: FeeEstimateResponse): number {
    if (response.quantization_mask === 0) {
      this.logger?.error('Fee quantization mask is 0, forcing to 1', {
        module: 'NodeRpcProxy',
        method: 'get_fee_estimate',
      });
    }
    return normalizeQuantizationMask(response.quantization_mask);
  }

  // ==========================================================================
  // Service nodes
  // ==========================================================================

  async getServiceNodes(publicKeys: readonly string[]): Promise<ProxyResult<readonly ServiceNodeState[]>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);

    const result = await this.guard.runExclusive(() =>
      this.invoke('get_service_nodes', { service_node_pubkeys: [...publicKeys] }, serviceNodesResponseSchema)
    );
    if (!result.ok) return result;
    return success(result.value.service_node_states.map(createServiceNodeState));
  }

  async getAllServiceNodes(): Promise<ProxyResult<readonly ServiceNodeState[]>> {
    if (this.isOffline) return failure(OFFLINE_FAILURE);
    const generation = this.store.generation;

    const heightResult = await this.getHeight();
    if (!heightResult.ok) return heightResult;
    const height = heightResult.value;

    const cached = this.store.serviceNodes;
    if (this.registryPolicy.isFresh(cached, [height])) {
      this.recordHit('get_all_service_nodes');
      return success(cached.nodes);
    }

    this.stats.misses++;
    return this.guard.runExclusive(async () => {
      const current = this.store.serviceNodes;
      if (this.registryPolicy.isFresh(current, [height])) {
        return success(current.nodes);
      }

      const result = await this.invoke('get_all_service_nodes', undefined, serviceNodesResponseSchema);
      if (!result.ok) return result;

      const nodes = result.value.service_node_states.map(createServiceNodeState);
      this.store.setServiceNodes(nodes, height, generation);
      this.logger?.debug(`Cached ${nodes.length} service nodes`, { module: 'NodeRpcProxy', height });
      return success(nodes);
    });
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  reset(): void {
    this.store.reset();
    this.stats = { hits: 0, misses: 0, remoteCalls: 0, failures: 0 };
    this.logger?.debug('Node cache cleared', { module: 'NodeRpcProxy', node: this.transport.url });
  }

  getCacheStats(): NodeCacheStats & { hitRate: number } {
    const total = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      hitRate: total > 0 ? (this.stats.hits / total) * 100 : 0,
    };
  }

  private recordHit(field: string): void {
    this.stats.hits++;
    this.logger?.trace(`Cache hit: ${field}`, { module: 'NodeRpcProxy' });
  }

  /**
   * Issue one remote call and validate its response; caller must hold the guard
   */
  private async invoke<T>(
    method: string,
    params: Record<string, unknown> | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ProxyResult<T>> {
    this.stats.remoteCalls++;
    const response = await this.transport.call(method, params);

    const checked = checkResponse(method, response);
    if (!checked.ok) {
      this.stats.failures++;
      this.logger?.warn(checked.failure.message, {
        module: 'NodeRpcProxy',
        method,
        error: response.ok ? undefined : response.error,
      });
      return checked;
    }

    const parsed = schema.safeParse(checked.value);
    if (!parsed.success) {
      this.stats.failures++;
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      this.logger?.warn(`Invalid ${method} response`, { module: 'NodeRpcProxy', method, issues });
      return failure({
        kind: 'invalid_response',
        method,
        message: `Invalid ${method} response from node: ${issues}`,
      });
    }

    return success(parsed.data);
  }
}
