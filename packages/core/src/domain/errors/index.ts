export { NodeRpcError } from './NodeRpcError.ts';
