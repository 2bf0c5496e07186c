/**
 * Why an accessor could not produce a value
 *
 * - `offline`: the session is offline, nothing was sent
 * - `unreachable`: the call itself failed or timed out
 * - `no_connection`: the node answered without a status
 * - `busy`: the node is overloaded
 * - `rpc_error`: the node (or local validation) rejected the request
 * - `invalid_response`: the node answered OK with a body we cannot read
 */
export type ProxyFailureKind =
  | 'offline'
  | 'unreachable'
  | 'no_connection'
  | 'busy'
  | 'rpc_error'
  | 'invalid_response';

/**
 * Human-readable failure description
 */
export interface ProxyFailure {
  readonly kind: ProxyFailureKind;
  /** Remote method that failed, when one was involved */
  readonly method?: string;
  readonly message: string;
}

/**
 * A value XOR a failure description
 */
export type ProxyResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: ProxyFailure };

export const OFFLINE_FAILURE: ProxyFailure = { kind: 'offline', message: 'offline' };

export function success<T>(value: T): ProxyResult<T> {
  return { ok: true, value };
}

export function failure(description: ProxyFailure): ProxyResult<never> {
  return { ok: false, failure: description };
}
