export { Logger, createLogger } from './logging/Logger.ts';
export { ExclusiveGuard } from './concurrency/ExclusiveGuard.ts';
export * from './rpc/index.ts';
