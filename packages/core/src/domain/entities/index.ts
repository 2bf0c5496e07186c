// Node info exports
export type { HeightSnapshot } from './NodeInfo.ts';
export { createHeightSnapshot } from './NodeInfo.ts';

// Fee exports
export { MIN_QUANTIZATION_MASK, normalizeQuantizationMask } from './FeeEstimate.ts';

// Service node exports
export type { ServiceNodeState } from './ServiceNode.ts';
export { createServiceNodeState } from './ServiceNode.ts';
