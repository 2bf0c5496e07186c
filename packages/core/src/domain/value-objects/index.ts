export { HardForkVersion } from './HardForkVersion.ts';
export type { ProxyFailureKind, ProxyFailure, ProxyResult } from './ProxyResult.ts';
export { OFFLINE_FAILURE, success, failure } from './ProxyResult.ts';
