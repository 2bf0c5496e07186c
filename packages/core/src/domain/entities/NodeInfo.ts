/**
 * Chain heights and block limit reported together by one info query
 */
export interface HeightSnapshot {
  /** Current chain height of the node */
  readonly height: number;
  /** Height the node is syncing towards (0 when fully synced) */
  readonly targetHeight: number;
  /** Maximum block weight */
  readonly blockWeightLimit: number;
}

/**
 * Create a HeightSnapshot from raw RPC data
 *
 * Nodes that predate block weights only report a size limit, so a zero
 * weight limit falls back to it.
 */
export function createHeightSnapshot(data: {
  height: number;
  target_height: number;
  block_weight_limit: number;
  block_size_limit: number;
}): HeightSnapshot {
  return {
    height: data.height,
    targetHeight: data.target_height,
    blockWeightLimit: data.block_weight_limit !== 0 ? data.block_weight_limit : data.block_size_limit,
  };
}
