/**
 * 测试辅助：可控时钟、测试配置、MemoryManager / HandoffCoordinator 工厂
 */

import { getDefaultConfig } from '../../src/config/loadConfig.js'
import type { Config, HandoffConfig, MemoryConfig } from '../../src/config/schema.js'
import { AgentDirectory } from '../../src/handoff/AgentDirectory.js'
import { HandoffCoordinator } from '../../src/handoff/HandoffCoordinator.js'
import { HumanEscalationQueue } from '../../src/handoff/HumanEscalationQueue.js'
import { MemoryManager } from '../../src/memory/MemoryManager.js'
import { createEventBus, type EventBus } from '../../src/scheduler/eventBus.js'
import type { Clock } from '../../src/shared/formatTime.js'
import { KeyedLock } from '../../src/shared/keyedLock.js'
import { createTierStores } from '../../src/store/createTierStores.js'
import type { TierStores } from '../../src/store/types.js'
import type { RelayEvents } from '../../src/types/events.js'

export const T0 = '2026-03-01T10:00:00.000Z'

export interface ManualClock {
  clock: Clock
  advance(ms: number): void
  set(iso: string): void
}

export function createManualClock(startIso: string = T0): ManualClock {
  let current = Date.parse(startIso)
  return {
    clock: () => new Date(current),
    advance(ms) {
      current += ms
    },
    set(iso) {
      current = Date.parse(iso)
    },
  }
}

/** 默认配置，退避缩短到毫秒级 */
export function testConfig(): Config {
  const config = getDefaultConfig()
  const fastRetry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, backoffMultiplier: 2, jitterFactor: 0 }
  return {
    ...config,
    memory: { ...config.memory, storeRetry: fastRetry },
    handoff: { ...config.handoff, deliveryRetry: fastRetry },
  }
}

export interface TestMemory {
  memory: MemoryManager
  stores: TierStores
  events: EventBus<RelayEvents>
  locks: KeyedLock
  time: ManualClock
  config: MemoryConfig
}

export function createTestMemory(
  options: { stores?: Partial<TierStores>; config?: Partial<MemoryConfig>; time?: ManualClock } = {},
): TestMemory {
  const config: MemoryConfig = { ...testConfig().memory, ...options.config }
  const stores: TierStores = { ...createTierStores(config), ...options.stores }
  const events = createEventBus<RelayEvents>({ deliveryAttempts: 3 })
  const locks = new KeyedLock()
  const time = options.time ?? createManualClock()
  const memory = new MemoryManager({ stores, config, locks, events, clock: time.clock })
  return { memory, stores, events, locks, time, config }
}

export interface ConversationSeed {
  leadId: string
  conversationId: string
  agentId?: string
  interactions: number
  outcomeScore: number
  scenarioTag?: string
  status?: 'active' | 'completed'
  preferences?: Record<string, string | number | boolean | string[]>
  attributes?: Record<string, string | number | boolean>
  concepts?: Array<{ name: string; category: string }>
}

/** 以 recordInteraction 逐次写入会话，最后一次带上结果分与状态 */
export async function seedConversation(memory: MemoryManager, seed: ConversationSeed): Promise<void> {
  const agentId = seed.agentId ?? 'qualifier'
  for (let i = 1; i <= seed.interactions; i++) {
    const last = i === seed.interactions
    await memory.recordInteraction({
      leadId: seed.leadId,
      conversationId: seed.conversationId,
      agentId,
      scenarioTag: seed.scenarioTag ?? 'demo',
      event: { type: 'agent_action', action: `step-${i}` },
      preferences: last ? seed.preferences : undefined,
      attributes: last ? seed.attributes : undefined,
      concepts: last ? seed.concepts : undefined,
      outcomeScore: last ? seed.outcomeScore : undefined,
      status: last ? seed.status : undefined,
    })
  }
}

export interface TestHandoff extends TestMemory {
  directory: AgentDirectory
  humanQueue: HumanEscalationQueue
  coordinator: HandoffCoordinator
}

/** MemoryManager + 交接协调器，共用锁、事件总线和时钟 */
export function createTestHandoff(
  options: {
    stores?: Partial<TierStores>
    handoff?: Partial<HandoffConfig>
    directory?: (testMemory: TestMemory) => AgentDirectory
  } = {},
): TestHandoff {
  const base = createTestMemory({ stores: options.stores })
  const defaults = testConfig()
  const handoff: HandoffConfig = { ...defaults.handoff, ...options.handoff }
  const directory =
    options.directory?.(base) ?? new AgentDirectory({ inboxCapacity: handoff.inboxCapacity, events: base.events })
  const humanQueue = new HumanEscalationQueue({ capacity: handoff.humanQueueCapacity })
  const coordinator = new HandoffCoordinator({
    memory: base.memory,
    directory,
    humanQueue,
    handoff,
    escalation: defaults.escalation,
    events: base.events,
    locks: base.locks,
    clock: base.time.clock,
  })
  return { ...base, directory, humanQueue, coordinator }
}
