/**
 * Express HTTP Server
 *
 * POST /rpc 承载 RPC 调用，GET /health 健康检查。
 * 调用方身份由上游网关写入 x-agent-id / x-agent-permissions 头。
 */

import express, { type Express, type Request, type Response } from 'express'
import type { Server } from 'http'
import type { ServerConfig } from '../config/schema.js'
import type { ErrorCode } from '../shared/error.js'
import { createLogger, logError } from '../shared/logger.js'
import { toRpcError, type Caller, type RpcId, type RpcRouter } from './rpcRouter.js'

const logger = createLogger('server')

export interface CreateServerOptions {
  router: RpcRouter
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  ERR_VALIDATION: 400,
  ERR_METHOD_NOT_FOUND: 404,
  ERR_NOT_FOUND: 404,
  ERR_PERMISSION: 403,
  ERR_OWNERSHIP: 409,
  ERR_INVALID_STATE: 409,
  ERR_UNAVAILABLE: 503,
  ERR_HANDOFF_FAILED: 502,
  ERR_CANCELLED: 499,
  ERR_CONFIG: 500,
  ERR_UNKNOWN: 500,
}

/** 从请求头读取调用方；缺失时返回 null */
export function readCaller(req: Request): Caller | null {
  const agentId = req.get('x-agent-id')?.trim()
  const permissions = req.get('x-agent-permissions')
  if (!agentId || permissions === undefined) return null
  return {
    agentId,
    permissions: permissions
      .split(',')
      .map(p => p.trim())
      .filter(Boolean),
  }
}

/** 逐行写出流式结果，最后一行带 done 和条数 */
async function writeStream(res: Response, id: RpcId, stream: AsyncIterable<unknown>): Promise<void> {
  res.status(200).type('application/x-ndjson')
  let count = 0
  try {
    for await (const item of stream) {
      res.write(`${JSON.stringify({ id, item })}\n`)
      count++
    }
    res.end(`${JSON.stringify({ id, done: true, count })}\n`)
  } catch (error) {
    logError(logger, 'RPC stream aborted', error)
    res.end(`${JSON.stringify({ id, error: toRpcError(error) })}\n`)
  }
}

export function createServer(options: CreateServerOptions): Express {
  const { router } = options
  const app = express()

  app.use(express.json({ limit: '1mb' }))

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', methods: router.methods() })
  })

  app.post('/rpc', async (req: Request, res: Response) => {
    const caller = readCaller(req)
    if (!caller) {
      res.status(401).json({ error: 'Missing x-agent-id or x-agent-permissions header' })
      return
    }

    // 客户端断开时取消进行中的调用
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort()
    })

    const response = await router.dispatch(req.body, caller, { signal: controller.signal })
    switch (response.kind) {
      case 'stream':
        await writeStream(res, response.id, response.stream)
        return
      case 'result':
        res.json({ id: response.id, result: response.result })
        return
      case 'error':
        res.status(HTTP_STATUS[response.error.data.type]).json({ id: response.id, error: response.error })
        return
    }
  })

  return app
}

export interface RunningServer {
  server: Server
  url: string
  close(): Promise<void>
}

/**
 * 启动 HTTP Server，监听成功后 resolve
 */
export function startServer(app: Express, config: Partial<ServerConfig> = {}): Promise<RunningServer> {
  const port = config.port ?? 3000
  const host = config.host ?? 'localhost'

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host)
    server.once('error', reject)
    server.once('listening', () => {
      server.off('error', reject)
      const address = server.address()
      const boundPort = address !== null && typeof address === 'object' ? address.port : port
      const url = `http://${host}:${boundPort}`
      logger.info(`Server started at ${url}`)
      resolve({
        server,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close(error => (error ? fail(error) : done()))
          }),
      })
    })
  })
}
