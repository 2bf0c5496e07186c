import type { HeightSnapshot } from '../../domain/entities/NodeInfo.ts';
import type { ServiceNodeState } from '../../domain/entities/ServiceNode.ts';
import { EMPTY_SLOT, populatedSlot, type LazySlot } from './FreshnessPolicy.ts';

/**
 * Info snapshot with the time it was fetched
 */
export interface CachedInfo {
  readonly snapshot: HeightSnapshot;
  readonly cachedAt: number;
}

/**
 * Fast-path height with its own timestamp
 */
export interface CachedHeight {
  readonly height: number;
  readonly cachedAt: number;
}

/**
 * Fee estimate keyed by the height and grace-block count it was fetched for
 */
export interface CachedFeeEstimate {
  readonly fee: number;
  readonly quantizationMask: number;
  readonly cachedForHeight: number;
  readonly cachedForGraceBlocks: number;
}

/**
 * Full service node registry as of one chain height
 */
export interface CachedServiceNodes {
  readonly nodes: readonly ServiceNodeState[];
  readonly cachedAtHeight: number;
}

/**
 * Per-session cache of node query results.
 *
 * Each field holds one immutable record, so a value and its freshness
 * metadata are always replaced together. Fields change only through their
 * setters, which accessors call after a successful remote call.
 *
 * Writes that follow a remote call carry the generation read before the
 * call; `reset()` bumps the generation, so a call that straddles a reset
 * never repopulates the cleared store.
 */
export class NodeCacheStore {
  private _generation = 0;
  private _info: CachedInfo | null = null;
  private _height: CachedHeight | null = null;
  private _rpcVersion: LazySlot<number> = EMPTY_SLOT;
  private _earliestHeights: Map<number, LazySlot<number>> = new Map();
  private _feeEstimate: CachedFeeEstimate | null = null;
  private _serviceNodes: CachedServiceNodes | null = null;

  /**
   * Incremented by every reset
   */
  get generation(): number {
    return this._generation;
  }

  get info(): CachedInfo | null {
    return this._info;
  }

  get height(): CachedHeight | null {
    return this._height;
  }

  get rpcVersion(): LazySlot<number> {
    return this._rpcVersion;
  }

  get feeEstimate(): CachedFeeEstimate | null {
    return this._feeEstimate;
  }

  get serviceNodes(): CachedServiceNodes | null {
    return this._serviceNodes;
  }

  /**
   * Store a fresh info snapshot; also refreshes the fast-path height
   */
  setInfo(snapshot: HeightSnapshot, now: number, generation: number): void {
    if (generation !== this._generation) return;
    this._info = { snapshot, cachedAt: now };
    this._height = { height: snapshot.height, cachedAt: now };
  }

  /**
   * Record a height learned outside the info query
   */
  setHeight(height: number, now: number): void {
    this._height = { height, cachedAt: now };
  }

  setRpcVersion(version: number, generation: number): void {
    if (generation !== this._generation) return;
    this._rpcVersion = populatedSlot(version);
  }

  earliestHeight(version: number): LazySlot<number> {
    return this._earliestHeights.get(version) ?? EMPTY_SLOT;
  }

  /**
   * Record an activation height. Zero means the node does not know the
   * version yet, which is indistinguishable from "not fetched", so it is
   * not stored.
   */
  setEarliestHeight(version: number, height: number, generation: number): void {
    if (height === 0 || generation !== this._generation) return;
    this._earliestHeights.set(version, populatedSlot(height));
  }

  setFeeEstimate(entry: CachedFeeEstimate, generation: number): void {
    if (generation !== this._generation) return;
    this._feeEstimate = entry;
  }

  setServiceNodes(nodes: readonly ServiceNodeState[], height: number, generation: number): void {
    if (generation !== this._generation) return;
    this._serviceNodes = { nodes, cachedAtHeight: height };
  }

  /**
   * Return every field to its initial, empty state
   */
  reset(): void {
    this._generation++;
    this._info = null;
    this._height = null;
    this._rpcVersion = EMPTY_SLOT;
    this._earliestHeights = new Map();
    this._feeEstimate = null;
    this._serviceNodes = null;
  }
}
