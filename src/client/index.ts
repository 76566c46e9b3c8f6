export { RpcClient } from './rpc-client';
export type { RpcCaller } from './rpc-client';
