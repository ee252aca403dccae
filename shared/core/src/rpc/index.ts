/**
 * JSON-RPC Module
 *
 * @module rpc
 */

export { JsonRpcClient, JsonRpcResponseSchema } from './json-rpc-client';
export type {
  FetchFn,
  JsonRpcClientOptions,
  JsonRpcRequest,
  JsonRpcResponse,
  RpcTarget,
  RpcTransport
} from './json-rpc-client';
