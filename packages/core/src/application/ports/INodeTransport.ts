/**
 * Status the node reports for a successfully processed request
 */
export const RPC_STATUS_OK = 'OK';

/**
 * Status the node reports when it is too busy to answer
 */
export const RPC_STATUS_BUSY = 'BUSY';

/**
 * Outcome of a single remote call.
 *
 * `ok: false` means the node could not be reached at all (network error or
 * timeout). Otherwise `status` carries the node's verdict: empty for no
 * usable connection, {@link RPC_STATUS_BUSY}, {@link RPC_STATUS_OK}, or the
 * name of an application-level error.
 */
export type TransportResponse =
  | {
      readonly ok: false;
      /** Underlying cause, when one is known */
      readonly error?: Error;
    }
  | {
      readonly ok: true;
      readonly status: string;
      /** Raw response body; only meaningful when status is OK */
      readonly result: unknown;
    };

/**
 * Request/response call against the remote node's query interface.
 * Implementations bound every call by a timeout and never throw:
 * every failure is reported through the returned {@link TransportResponse}.
 */
export interface INodeTransport {
  /**
   * Node endpoint URL
   */
  readonly url: string;

  /**
   * Issue one remote call
   */
  call(method: string, params?: Record<string, unknown>): Promise<TransportResponse>;
}
