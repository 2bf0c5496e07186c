import type { ProxyFailure, ProxyFailureKind } from '../value-objects/ProxyResult.ts';

/**
 * Unrecoverable node failure.
 *
 * Only thrown by queries that must not fall back to a cached value; callers
 * should abort the operation that needed the answer rather than retry.
 */
export class NodeRpcError extends Error {
  readonly kind: ProxyFailureKind;
  readonly method?: string;

  constructor(failure: ProxyFailure, options?: { cause?: unknown }) {
    super(failure.message, { cause: options?.cause });
    this.name = 'NodeRpcError';
    this.kind = failure.kind;
    this.method = failure.method;
  }
}
