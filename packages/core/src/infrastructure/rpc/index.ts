export { JsonRpcTransport } from './JsonRpcTransport.ts';
export { NodeRpcProxy, checkResponse } from './NodeRpcProxy.ts';
export { createNodeRpcProxy } from './createNodeRpcProxy.ts';
export {
  getInfoResponseSchema,
  getVersionResponseSchema,
  earliestHeightResponseSchema,
  hardForkVersionResponseSchema,
  feeEstimateResponseSchema,
  serviceNodesResponseSchema,
} from './NodeRpcSchemas.ts';
export type { GetInfoResponse, FeeEstimateResponse, ServiceNodesResponse } from './NodeRpcSchemas.ts';
