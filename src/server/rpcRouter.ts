/**
 * RPC 路由
 *
 * 方法名 → { 权限 scope, zod 参数, handler }。调用方身份由上游认证后以
 * { agentId, permissions } 传入；这里只做 scope 匹配和“代表谁行事”的检查。
 */

import { z } from 'zod'
import type { AgentDirectory } from '../handoff/AgentDirectory.js'
import type { HandoffCoordinator } from '../handoff/HandoffCoordinator.js'
import type { MemoryManager } from '../memory/MemoryManager.js'
import { TIERS, type QueryHit, type Tier, type TierCriteriaMap } from '../memory/types.js'
import type { ConsolidationScheduler } from '../scheduler/ConsolidationScheduler.js'
import type { EventBus } from '../scheduler/eventBus.js'
import {
  AppError,
  MethodNotFoundError,
  NotFoundError,
  PermissionError,
  ValidationError,
  type ErrorCode,
} from '../shared/error.js'
import { createLogger, logError } from '../shared/logger.js'
import type { CallerIdentity } from '../types/agent.js'
import { RELAY_EVENT_NAMES, type RelayEvents } from '../types/events.js'
import { CONVERSATION_STATES, handoffRequestSchema } from '../types/handoff.js'
import { streamEvents } from './eventStream.js'

const logger = createLogger('rpc')

export type RpcId = string | number | null

/** 上游已验证的调用方 */
export type Caller = CallerIdentity

export interface CallContext {
  caller: Caller
  signal?: AbortSignal
}

export interface RpcErrorBody {
  code: number
  message: string
  data: {
    type: ErrorCode
    context: Record<string, unknown>
    issues?: string[]
    suggestion?: string
  }
}

export type RpcResponse =
  | { kind: 'result'; id: RpcId; result: unknown }
  | { kind: 'stream'; id: RpcId; stream: AsyncIterable<unknown> }
  | { kind: 'error'; id: RpcId; error: RpcErrorBody }

type RpcOutput = { kind: 'result'; value: unknown } | { kind: 'stream'; stream: AsyncIterable<unknown> }

interface MethodSpec<P> {
  scope: string
  params: z.ZodType<P, z.ZodTypeDef, unknown>
  handle(params: P, context: CallContext): Promise<RpcOutput>
}

interface RegisteredMethod {
  scope: string
  invoke(params: unknown, context: CallContext): Promise<RpcOutput>
}

export interface RpcRouterOptions {
  memory: MemoryManager
  coordinator: HandoffCoordinator
  directory: AgentDirectory
  /** events.subscribe 的来源 */
  events: EventBus<RelayEvents>
  /** 提供时 memory.consolidate 走调度器，与定时运行互斥 */
  scheduler?: ConsolidationScheduler
}

export interface RpcRouter {
  methods(): string[]
  dispatch(request: unknown, caller: Caller, options?: { signal?: AbortSignal }): Promise<RpcResponse>
}

const envelopeSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
})

const criteriaSchemas: { [K in Tier]: z.ZodType<TierCriteriaMap[K], z.ZodTypeDef, unknown> } = {
  short_term: z
    .object({
      leadId: z.string().min(1).optional(),
      tag: z.string().min(1).optional(),
      limit: z.number().int().positive().optional(),
    })
    .strict(),
  long_term: z
    .object({
      kind: z.enum(['lead_profile', 'handoff_record']).optional(),
      leadId: z.string().min(1).optional(),
      tag: z.string().min(1).optional(),
      minRfmScore: z.number().min(0).max(1).optional(),
      limit: z.number().int().positive().optional(),
    })
    .strict(),
  episodic: z
    .object({
      fingerprint: z.array(z.number().finite()).min(1),
      limit: z.number().int().positive().optional(),
      minSimilarity: z.number().min(-1).max(1).optional(),
      scenarioTag: z.string().min(1).optional(),
      leadId: z.string().min(1).optional(),
    })
    .strict(),
  semantic: z
    .object({
      from: z.string().min(1),
      maxDepth: z.number().int().positive().optional(),
      relationTypes: z.array(z.string().min(1)).optional(),
    })
    .strict(),
}

const putParamsSchema = z
  .object({
    key: z.string().min(1),
    payload: z.unknown(),
    ttlSeconds: z.number().positive().optional(),
    keepTtl: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict()

const keyParamsSchema = z.object({ key: z.string().min(1) }).strict()

const queryParamsSchema = z.object({ criteria: z.unknown() }).strict()

const escalateParamsSchema = z
  .object({
    leadId: z.string().min(1),
    reason: z.string().min(1),
    /** 省略时取调用方 */
    agentId: z.string().min(1).optional(),
    conversationId: z.string().min(1).optional(),
    recommendedActions: z.array(z.string()).optional(),
    priority: z.enum(['low', 'medium', 'high']).optional(),
  })
  .strict()

const openParamsSchema = z
  .object({
    conversationId: z.string().min(1),
    leadId: z.string().min(1),
  })
  .strict()

const transitionParamsSchema = z
  .object({
    conversationId: z.string().min(1),
    to: z.enum(CONVERSATION_STATES),
    reason: z.string().min(1).optional(),
  })
  .strict()

const emptyParamsSchema = z.object({}).strict()

const registerParamsSchema = z
  .object({
    role: z.string().min(1),
    score: z.number().min(0).max(1).optional(),
  })
  .strict()

const ticketParamsSchema = z.object({ ticketId: z.string().min(1) }).strict()

const resolveParamsSchema = z
  .object({
    ticketId: z.string().min(1),
    assignTo: z.string().min(1),
    notes: z.string().optional(),
  })
  .strict()

const subscribeParamsSchema = z
  .object({
    events: z.array(z.enum(RELAY_EVENT_NAMES)).optional(),
    /** 收到这么多条后结束流；省略时持续到调用方断开 */
    limit: z.number().int().positive().optional(),
  })
  .strict()

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${label}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return parsed.data
}

function method<P>(spec: MethodSpec<P>): RegisteredMethod {
  return {
    scope: spec.scope,
    invoke: (params, context) => spec.handle(parseWith(spec.params, params ?? {}, 'params'), context),
  }
}

const result = (value: unknown): RpcOutput => ({ kind: 'result', value })

/**
 * 权限匹配：完全相同、`prefix.*` 前缀、或 `*`
 */
export function hasPermission(permissions: readonly string[], scope: string): boolean {
  return permissions.some(permission => {
    if (permission === '*' || permission === scope) return true
    if (permission.endsWith('.*')) return scope.startsWith(permission.slice(0, -1))
    return false
  })
}

function assertActingAs(caller: Caller, agentId: string): void {
  if (caller.agentId !== agentId) {
    throw new PermissionError(`Caller ${caller.agentId} cannot act as ${agentId}`, {
      context: { caller: caller.agentId, agentId },
    })
  }
}

export function toRpcError(error: unknown): RpcErrorBody {
  const appError = AppError.from(error)
  return {
    code: appError.rpcCode,
    message: appError.message,
    data: {
      type: appError.code,
      context: appError.context,
      ...(appError instanceof ValidationError && appError.issues.length > 0 && { issues: appError.issues }),
      ...(appError.suggestion !== undefined && { suggestion: appError.suggestion }),
    },
  }
}

async function* streamHits<T extends Tier>(hits: AsyncIterable<QueryHit<T>>): AsyncGenerator<unknown> {
  for await (const hit of hits) {
    yield {
      key: hit.record.key,
      relevance: hit.relevance,
      payload: hit.record.payload,
      tags: hit.record.tags,
    }
  }
}

export function createRpcRouter(options: RpcRouterOptions): RpcRouter {
  const { memory, coordinator, directory, events, scheduler } = options
  const registry = new Map<string, RegisteredMethod>()

  const registerTier = <T extends Tier>(tier: T) => {
    const scope = `memory.${tier}`

    registry.set(
      `${scope}.put`,
      method({
        scope,
        params: putParamsSchema,
        handle: async (params, { caller, signal }) => {
          await memory.put(tier, params.key, params.payload, {
            ttlSeconds: params.ttlSeconds,
            keepTtl: params.keepTtl,
            tags: params.tags,
            agentId: caller.agentId,
            signal,
          })
          return result({ ok: true })
        },
      }),
    )

    registry.set(
      `${scope}.get`,
      method({
        scope,
        params: keyParamsSchema,
        handle: async (params, { signal }) => {
          const record = await memory.get(tier, params.key, { signal })
          return result(record ? { payload: record.payload } : { notFound: true })
        },
      }),
    )

    registry.set(
      `${scope}.query`,
      method({
        scope,
        params: queryParamsSchema,
        handle: async (params, { signal }) => {
          const criteria = parseWith(criteriaSchemas[tier], params.criteria ?? {}, `${tier} criteria`)
          return { kind: 'stream', stream: streamHits(memory.query(tier, criteria, { signal })) }
        },
      }),
    )
  }
  for (const tier of TIERS) registerTier(tier)

  registry.set(
    'agent.handoff',
    method({
      scope: 'agent.handoff',
      params: handoffRequestSchema,
      handle: async (params, { caller, signal }) => {
        assertActingAs(caller, params.sourceAgent)
        return result(await coordinator.requestHandoff(params, { signal }))
      },
    }),
  )

  registry.set(
    'agent.escalate',
    method({
      scope: 'agent.escalate',
      params: escalateParamsSchema,
      handle: async (params, { caller, signal }) => {
        const agentId = params.agentId ?? caller.agentId
        assertActingAs(caller, agentId)
        const ticket = await coordinator.escalate({ ...params, agentId, signal })
        return result({ ticketId: ticket.ticketId })
      },
    }),
  )

  registry.set(
    'agent.register',
    method({
      scope: 'agent.register',
      params: registerParamsSchema,
      handle: async (params, { caller }) => result(await directory.register({ agentId: caller.agentId, ...params })),
    }),
  )

  registry.set(
    'agent.unregister',
    method({
      scope: 'agent.register',
      params: emptyParamsSchema,
      handle: async (_params, { caller }) => result({ removed: await directory.unregister(caller.agentId) }),
    }),
  )

  registry.set(
    'agent.list',
    method({
      scope: 'agent.status',
      params: emptyParamsSchema,
      handle: async () => result({ agents: directory.list() }),
    }),
  )

  registry.set(
    'agent.inbox.receive',
    method({
      scope: 'agent.inbox',
      params: emptyParamsSchema,
      handle: async (_params, { caller }) => {
        if (!directory.get(caller.agentId)) throw new NotFoundError('Agent', caller.agentId)
        const envelope = await directory.receive(caller.agentId)
        return result(envelope ? { envelope } : { empty: true })
      },
    }),
  )

  registry.set(
    'escalation.list',
    method({
      scope: 'escalation',
      params: emptyParamsSchema,
      handle: async () => result({ tickets: coordinator.waitingEscalations() }),
    }),
  )

  registry.set(
    'escalation.claim',
    method({
      scope: 'escalation',
      params: ticketParamsSchema,
      handle: async (params, { caller }) => result(coordinator.claimEscalation(params.ticketId, caller.agentId)),
    }),
  )

  registry.set(
    'escalation.resolve',
    method({
      scope: 'escalation',
      params: resolveParamsSchema,
      handle: async (params, { caller, signal }) =>
        result(
          await coordinator.resolveEscalation(params.ticketId, {
            assignTo: params.assignTo,
            resolvedBy: caller.agentId,
            notes: params.notes,
            signal,
          }),
        ),
    }),
  )

  registry.set(
    'events.subscribe',
    method({
      scope: 'events',
      params: subscribeParamsSchema,
      handle: async (params, { signal }) => ({
        kind: 'stream',
        stream: streamEvents(events, { names: params.events, limit: params.limit, signal }),
      }),
    }),
  )

  registry.set(
    'conversation.open',
    method({
      scope: 'conversation',
      params: openParamsSchema,
      handle: async (params, { caller, signal }) =>
        result(await coordinator.openConversation({ ...params, ownerAgent: caller.agentId, signal })),
    }),
  )

  registry.set(
    'conversation.transition',
    method({
      scope: 'conversation',
      params: transitionParamsSchema,
      handle: async (params, { caller, signal }) =>
        result(
          await coordinator.transition(params.conversationId, params.to, caller.agentId, {
            reason: params.reason,
            signal,
          }),
        ),
    }),
  )

  registry.set(
    'memory.consolidate',
    method({
      scope: 'memory.consolidate',
      params: emptyParamsSchema,
      handle: async (_params, { signal }) =>
        result(scheduler ? await scheduler.trigger() : await memory.consolidate({ signal })),
    }),
  )

  registry.set(
    'memory.status',
    method({
      scope: 'memory.status',
      params: emptyParamsSchema,
      handle: async () => result(await memory.getStatus()),
    }),
  )

  return {
    methods: () => [...registry.keys()].sort(),

    async dispatch(request, caller, dispatchOptions = {}) {
      const envelope = envelopeSchema.safeParse(request)
      if (!envelope.success) {
        return { kind: 'error', id: null, error: toRpcError(new ValidationError('Invalid RPC request')) }
      }
      const { method: name, params } = envelope.data
      const id = envelope.data.id ?? null

      try {
        const entry = registry.get(name)
        if (!entry) throw new MethodNotFoundError(name)
        if (!hasPermission(caller.permissions, entry.scope)) {
          throw new PermissionError(`Caller ${caller.agentId} lacks permission ${entry.scope}`, {
            context: { caller: caller.agentId, method: name },
          })
        }

        logger.debug(`${caller.agentId} → ${name}`)
        const output = await entry.invoke(params, { caller, signal: dispatchOptions.signal })
        return output.kind === 'stream'
          ? { kind: 'stream', id, stream: output.stream }
          : { kind: 'result', id, result: output.value }
      } catch (error) {
        if (!(error instanceof AppError)) {
          logError(logger, `Unexpected failure in ${name}`, error, { caller: caller.agentId })
        }
        return { kind: 'error', id, error: toRpcError(error) }
      }
    },
  }
}
