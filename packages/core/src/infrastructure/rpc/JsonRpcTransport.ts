import { BaseError, HttpRequestError, TimeoutError, http } from 'viem';
import type { EIP1193RequestFn } from 'viem';
import type { ILogger } from '../../application/ports/ILogger.ts';
import type { INodeTransport, TransportResponse } from '../../application/ports/INodeTransport.ts';

const DEFAULT_TIMEOUT_MS = 210_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * JSON-RPC transport to a node's `/json_rpc` endpoint, using viem's HTTP transport
 *
 * Retries are disabled: a failed call is reported once and the caller decides
 * what to do next. The node reports success or failure in a `status` field of
 * the result; JSON-RPC error objects surface as a non-OK status.
 */
export class JsonRpcTransport implements INodeTransport {
  readonly url: string;
  readonly endpoint: string;
  private readonly request: EIP1193RequestFn;
  private readonly logger?: ILogger;

  constructor(params: { url: string; timeout?: number; logger?: ILogger }) {
    this.url = params.url;
    this.endpoint = `${params.url.replace(/\/+$/, '')}/json_rpc`;
    this.logger = params.logger;

    const transport = http(this.endpoint, {
      timeout: params.timeout ?? DEFAULT_TIMEOUT_MS,
      retryCount: 0,
    })({ retryCount: 0 });
    this.request = transport.request;
  }

  async call(method: string, params?: Record<string, unknown>): Promise<TransportResponse> {
    let result: unknown;
    try {
      result = await this.request({ method, params });
    } catch (error) {
      return this.toResponse(method, error);
    }

    const status = isRecord(result) && typeof result.status === 'string' ? result.status : '';
    return { ok: true, status, result };
  }

  private toResponse(method: string, error: unknown): TransportResponse {
    if (error instanceof HttpRequestError || error instanceof TimeoutError) {
      this.logger?.debug(`Node unreachable: ${error.shortMessage}`, {
        module: 'JsonRpcTransport',
        node: this.url,
        method,
      });
      return { ok: false, error };
    }

    // The node answered with a JSON-RPC error object
    if (error instanceof BaseError) {
      return { ok: true, status: error.details || error.shortMessage, result: undefined };
    }

    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}
