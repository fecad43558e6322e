/**
 * @entry Server 模块
 *
 * 主要 API:
 * - createRpcRouter(options): 方法注册、权限与参数校验
 * - createServer({ router }): Express app（POST /rpc, GET /health）
 * - startServer(app, config): 监听端口
 */

export {
  createRpcRouter,
  hasPermission,
  toRpcError,
  type Caller,
  type CallContext,
  type RpcErrorBody,
  type RpcId,
  type RpcResponse,
  type RpcRouter,
  type RpcRouterOptions,
} from './rpcRouter.js'
export { createServer, readCaller, startServer, type CreateServerOptions, type RunningServer } from './createServer.js'
