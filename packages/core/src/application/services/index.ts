export { NodeCacheStore } from './NodeCacheStore.ts';
export type { CachedInfo, CachedHeight, CachedFeeEstimate, CachedServiceNodes } from './NodeCacheStore.ts';

export {
  TimeToLivePolicy,
  DrivingValuePolicy,
  PopulateOncePolicy,
  EMPTY_SLOT,
  populatedSlot,
} from './FreshnessPolicy.ts';
export type { Timestamped, LazySlot } from './FreshnessPolicy.ts';
