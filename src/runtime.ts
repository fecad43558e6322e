/**
 * 组装根：按配置创建存储、锁、事件总线、记忆管理、交接协调与 RPC 路由
 *
 * 没有全局单例；每次调用得到一套独立实例。
 */

import type { Config } from './config/schema.js'
import { AgentDirectory } from './handoff/AgentDirectory.js'
import { HandoffCoordinator } from './handoff/HandoffCoordinator.js'
import { HumanEscalationQueue } from './handoff/HumanEscalationQueue.js'
import { MemoryManager } from './memory/MemoryManager.js'
import { ConsolidationScheduler } from './scheduler/ConsolidationScheduler.js'
import { createEventBus, type EventBus } from './scheduler/eventBus.js'
import { createRpcRouter, type RpcRouter } from './server/rpcRouter.js'
import { systemClock, type Clock } from './shared/formatTime.js'
import { KeyedLock } from './shared/keyedLock.js'
import { createLogger } from './shared/logger.js'
import { createTierStores } from './store/createTierStores.js'
import { loadSeedFile, seedSemanticStore } from './store/seedKnowledge.js'
import type { TierStores } from './store/types.js'
import type { RelayEvents } from './types/events.js'

const logger = createLogger('runtime')

export interface LeadRelayOverrides {
  /** 替换个别层级存储，如测试中注入故障存储 */
  stores?: Partial<TierStores>
  clock?: Clock
  dataDir?: string
}

export interface LeadRelay {
  config: Config
  stores: TierStores
  events: EventBus<RelayEvents>
  locks: KeyedLock
  memory: MemoryManager
  directory: AgentDirectory
  humanQueue: HumanEscalationQueue
  coordinator: HandoffCoordinator
  scheduler: ConsolidationScheduler
  router: RpcRouter
  /** 按配置启动定时整合 */
  start(): void
  /** 停止调度并等待进行中的整合结束 */
  shutdown(): Promise<void>
}

export async function createLeadRelay(config: Config, overrides: LeadRelayOverrides = {}): Promise<LeadRelay> {
  const clock = overrides.clock ?? systemClock
  const stores: TierStores = { ...createTierStores(config.memory, overrides.dataDir), ...overrides.stores }

  const seedFile = config.memory.semanticSeedFile
  if (seedFile) {
    const written = await seedSemanticStore(stores.semantic, loadSeedFile(seedFile), clock().toISOString())
    logger.info(`Seeded ${written} semantic records from ${seedFile}`)
  }

  const events = createEventBus<RelayEvents>({ deliveryAttempts: config.events.deliveryAttempts })
  const locks = new KeyedLock()
  const memory = new MemoryManager({ stores, config: config.memory, locks, events, clock })
  const directory = new AgentDirectory({ inboxCapacity: config.handoff.inboxCapacity, events })
  const humanQueue = new HumanEscalationQueue({ capacity: config.handoff.humanQueueCapacity })
  const coordinator = new HandoffCoordinator({
    memory,
    directory,
    humanQueue,
    handoff: config.handoff,
    escalation: config.escalation,
    events,
    locks,
    clock,
  })
  const scheduler = new ConsolidationScheduler({ memory, interval: config.consolidation.interval, clock })
  const router = createRpcRouter({ memory, coordinator, directory, events, scheduler })

  return {
    config,
    stores,
    events,
    locks,
    memory,
    directory,
    humanQueue,
    coordinator,
    scheduler,
    router,
    start() {
      if (config.consolidation.enabled) scheduler.start()
    },
    async shutdown() {
      await scheduler.stop()
      events.clear()
      logger.info('Lead relay stopped')
    },
  }
}
