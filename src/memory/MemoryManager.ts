/**
 * Memory manager — the single entry point agents use for tiered memory
 *
 * - put / get / update / query over the four tier stores
 * - payloads validated against the tier's closed variant set
 * - per-record locks: writes to one key apply in arrival order
 * - store calls retried with backoff, then surfaced as UnavailableError
 * - consolidate(): short → long, outcome → episodic, relation → semantic
 */

import type { MemoryConfig, ThresholdsConfig } from '../config/schema.js'
import { createEventBus, type EventBus } from '../scheduler/eventBus.js'
import { throwIfAborted } from '../shared/abort.js'
import {
  AppError,
  CancelledError,
  OwnershipError,
  UnavailableError,
  ValidationError,
} from '../shared/error.js'
import { systemClock, type Clock } from '../shared/formatTime.js'
import { generatePrefixedId } from '../shared/generateId.js'
import { KeyedLock, lockKeys } from '../shared/keyedLock.js'
import { createLogger, logError } from '../shared/logger.js'
import { fromPromise } from '../shared/result.js'
import { withRetry } from '../shared/retryStrategy.js'
import { isExpired } from '../store/ShortTermStore.js'
import type { KeyedTierStore, TierStores, TierStoreStatus } from '../store/types.js'
import type { RelayEvents } from '../types/events.js'
import { conceptPairs, strengthenEdge, type ConceptPair } from './associationEngine.js'
import { buildEpisode, episodeTags } from './extractEpisode.js'
import { computeFingerprint } from './fingerprint.js'
import { foldConversation } from './foldLeadProfile.js'
import {
  CONSOLIDATION_RULES,
  canonicalKey,
  memoryKeys,
  payloadSchemas,
  type AnyPayload,
  type ConceptRef,
  type ConsolidationError,
  type ConsolidationRule,
  type ConsolidationSummary,
  type ConversationContext,
  type ConversationEvent,
  type Episode,
  type EpisodicCriteria,
  type LongTermCriteria,
  type MemoryRecord,
  type PreferenceValue,
  type QueryHit,
  type RuleCounts,
  type SemanticCriteria,
  type ShortTermCriteria,
  type Tier,
  type TierCriteriaMap,
  type TierPayloadMap,
} from './types.js'

const logger = createLogger('memory')

// ── Options ──

export interface PutOptions {
  /** Required for new short-term records; rejected for other tiers */
  ttlSeconds?: number
  tags?: string[]
  /** Keep the existing record's expiry instead of requiring a new TTL */
  keepTtl?: boolean
  /** Acting agent; conversation records only accept writes from their owner */
  agentId?: string
  signal?: AbortSignal
}

export interface ReadOptions {
  signal?: AbortSignal
}

export interface InteractionInput {
  leadId: string
  conversationId: string
  agentId: string
  scenarioTag?: string
  event?: {
    type?: ConversationEvent['type']
    action?: string
    concepts?: string[]
    data?: Record<string, unknown>
  }
  outcomeScore?: number
  preferences?: Record<string, PreferenceValue>
  attributes?: ConversationContext['attributes']
  concepts?: ConceptRef[]
  status?: ConversationContext['status']
  /** Refreshes the expiry; new conversations default to defaultShortTermTtlSeconds */
  ttlSeconds?: number
  signal?: AbortSignal
}

export interface SimilarEpisode {
  episode: Episode
  similarity: number
}

export interface MemoryStatus {
  tiers: TierStoreStatus[]
  thresholds: ThresholdsConfig
}

/** Registered owner of a conversation, or null when the conversation is not registered */
export type ConversationOwnerLookup = (conversationId: string) => string | null

export interface MemoryManagerOptions {
  stores: TierStores
  config: MemoryConfig
  /** Shared with the handoff coordinator so lead locks cover both */
  locks?: KeyedLock
  events?: EventBus<RelayEvents>
  clock?: Clock
}

/** Successful episodes used for recommendations */
const SUCCESS_OUTCOME = 0.7
const DEFAULT_QUERY_LIMIT = 10
const DEFAULT_SCENARIO = 'general'

type Candidate = 'migrated' | 'skipped'

type KeyedStores = { [K in Tier]: KeyedTierStore<K> }

type QueryHandlers = {
  [K in Tier]: (criteria: TierCriteriaMap[K], signal?: AbortSignal) => AsyncGenerator<QueryHit<K>>
}

function zeroCounts(): RuleCounts {
  return { migrated: 0, skipped: 0, failed: 0 }
}

function groupByLead(contexts: ConversationContext[]): Map<string, ConversationContext[]> {
  const groups = new Map<string, ConversationContext[]>()
  for (const context of contexts) {
    const group = groups.get(context.leadId) ?? []
    group.push(context)
    groups.set(context.leadId, group)
  }
  return groups
}

function defaultTags(payload: AnyPayload): string[] {
  switch (payload.kind) {
    case 'conversation':
      return [`lead:${payload.context.leadId}`]
    case 'lead_profile':
      return [`lead:${payload.profile.leadId}`]
    case 'handoff_record':
      return [`lead:${payload.record.leadId}`, 'handoff']
    case 'episode':
      return episodeTags(payload.episode)
    case 'scratchpad':
    case 'concept':
    case 'edge':
      return []
  }
}

function byRecency<T extends Tier>(a: MemoryRecord<T>, b: MemoryRecord<T>): number {
  return Date.parse(b.lastAccessedAt) - Date.parse(a.lastAccessedAt) || a.key.localeCompare(b.key)
}

export class MemoryManager {
  readonly locks: KeyedLock
  private readonly stores: TierStores
  private readonly keyed: KeyedStores
  private readonly config: MemoryConfig
  private readonly events: EventBus<RelayEvents>
  private readonly clock: Clock
  private readonly queryHandlers: QueryHandlers
  private ownerLookup: ConversationOwnerLookup = () => null

  constructor(options: MemoryManagerOptions) {
    this.stores = options.stores
    this.keyed = options.stores
    this.config = options.config
    this.locks = options.locks ?? new KeyedLock()
    this.events = options.events ?? createEventBus<RelayEvents>()
    this.clock = options.clock ?? systemClock

    this.queryHandlers = {
      short_term: (criteria, signal) => this.queryShortTerm(criteria, signal),
      long_term: (criteria, signal) => this.queryLongTerm(criteria, signal),
      episodic: (criteria, signal) => this.queryEpisodic(criteria, signal),
      semantic: (criteria, signal) => this.querySemantic(criteria, signal),
    }
  }

  get thresholds(): ThresholdsConfig {
    return this.config.thresholds
  }

  private now(): Date {
    return this.clock()
  }

  /**
   * 会话注册表（交接协调器）提供的持有者查询；
   * 注册过的会话以注册表为准，即使短期上下文已过期
   */
  useOwnershipLookup(lookup: ConversationOwnerLookup): void {
    this.ownerLookup = lookup
  }

  private assertConversationWriter(
    context: ConversationContext,
    previous: ConversationContext | null,
    actor?: string,
  ): void {
    const { conversationId, leadId } = context
    const owner = this.ownerLookup(conversationId) ?? previous?.currentAgent
    if (owner !== undefined && context.currentAgent !== owner) {
      throw new OwnershipError(`Conversation ${conversationId} is owned by ${owner}, not ${context.currentAgent}`, {
        context: { leadId, conversationId },
        suggestion: 'Ownership only changes through a handoff',
      })
    }
    if (actor !== undefined && actor !== context.currentAgent) {
      throw new OwnershipError(`Conversation ${conversationId} is owned by ${context.currentAgent}, not ${actor}`, {
        context: { leadId, conversationId },
      })
    }
  }

  // ── Store access ──

  /**
   * Run a store call with retry/backoff. Exhausted transient failures become UnavailableError.
   */
  private async storeCall<R>(
    tier: Tier,
    key: string,
    operation: string,
    fn: () => Promise<R>,
    signal?: AbortSignal,
  ): Promise<R> {
    const result = await withRetry(() => fn(), {
      config: this.config.storeRetry,
      signal,
      onRetry: decision => logger.warn(`${tier} store ${operation} failed for ${key}: ${decision.reason}`),
    })
    if (result.success) return result.value

    const { error } = result
    if (!error.retryable) throw AppError.from(error.originalError)

    const unavailable = new UnavailableError(
      `${tier} store unavailable during ${operation} after ${result.attempts} attempts`,
      { cause: error.originalError, context: { tier, key, attempt: result.attempts } },
    )
    logError(logger, 'Tier store call exhausted retries', error.originalError, {
      tier,
      key,
      attempt: result.attempts,
    })
    throw unavailable
  }

  private readLive<T extends Tier>(tier: T, key: string, signal?: AbortSignal): Promise<MemoryRecord<T> | null> {
    const store = this.keyed[tier]
    return this.storeCall(tier, key, 'read', () => store.read(key), signal).then(record => {
      if (record && isExpired(record, this.now().getTime())) return null
      return record
    })
  }

  private writeRecord<T extends Tier>(record: MemoryRecord<T>, signal?: AbortSignal): Promise<void> {
    const store = this.keyed[record.tier]
    return this.storeCall(record.tier, record.key, 'write', () => store.write(record), signal)
  }

  private validatePayload<T extends Tier>(tier: T, key: string, payload: unknown): TierPayloadMap[T] {
    const parsed = payloadSchemas[tier].safeParse(payload)
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid ${tier} payload for ${key}`,
        parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        { context: { tier, key } },
      )
    }
    const expectedKey = canonicalKey(parsed.data)
    if (expectedKey !== null && expectedKey !== key) {
      throw new ValidationError(`Key ${key} does not match payload; expected ${expectedKey}`, [], {
        context: { tier, key },
      })
    }
    return parsed.data
  }

  // ── put / get / update ──

  async put<T extends Tier>(tier: T, key: string, payload: unknown, options: PutOptions = {}): Promise<MemoryRecord<T>> {
    throwIfAborted(options.signal)
    if (!key) throw new ValidationError('Record key must not be empty')

    const validated = this.validatePayload(tier, key, payload)
    if (validated.kind === 'lead_profile' || validated.kind === 'episode' || validated.kind === 'edge') {
      throw new ValidationError(`${validated.kind} records are derived by consolidation and cannot be written directly`, [], {
        context: { tier, key },
      })
    }
    if (options.ttlSeconds !== undefined) {
      if (tier !== 'short_term') {
        throw new ValidationError('ttlSeconds is only supported for short-term records', [], { context: { tier, key } })
      }
      if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds <= 0) {
        throw new ValidationError('ttlSeconds must be a positive number', [], { context: { tier, key } })
      }
    }

    return this.locks.run(
      lockKeys.record(tier, key),
      async () => {
        const existing = await this.readLive(tier, key, options.signal)
        if (validated.kind === 'conversation') {
          const previous = existing?.payload.kind === 'conversation' ? existing.payload.context : null
          this.assertConversationWriter(validated.context, previous, options.agentId)
        }
        const now = this.now()

        let expiresAt: string | undefined
        if (options.ttlSeconds !== undefined) {
          expiresAt = new Date(now.getTime() + options.ttlSeconds * 1000).toISOString()
        } else if (tier === 'short_term') {
          if (!options.keepTtl || !existing?.expiresAt) {
            throw new ValidationError('Short-term records require ttlSeconds', [], { context: { tier, key } })
          }
          expiresAt = existing.expiresAt
        }

        const record: MemoryRecord<T> = {
          tier,
          key,
          payload: validated,
          createdAt: existing?.createdAt ?? now.toISOString(),
          lastAccessedAt: now.toISOString(),
          expiresAt,
          tags: options.tags ?? existing?.tags ?? defaultTags(validated),
        }
        await this.writeRecord(record, options.signal)
        logger.debug(`put ${tier}/${key}`)
        return record
      },
      options.signal,
    )
  }

  /**
   * @returns the record, or null when absent or (short-term) expired
   */
  async get<T extends Tier>(tier: T, key: string, options: ReadOptions = {}): Promise<MemoryRecord<T> | null> {
    throwIfAborted(options.signal)
    // touch 在部分后端是读改写，与 put 同锁才能保证写入顺序
    return this.locks.run(
      lockKeys.record(tier, key),
      async () => {
        const record = await this.readLive(tier, key, options.signal)
        if (!record) return null

        const accessedAt = this.now().toISOString()
        const store = this.keyed[tier]
        await this.storeCall(tier, key, 'touch', () => store.touch(key, accessedAt), options.signal)
        return { ...record, lastAccessedAt: accessedAt }
      },
      options.signal,
    )
  }

  /**
   * Atomic read-modify-write under the record lock; keeps the expiry
   * @returns the updated record, or null when absent or expired
   */
  async update<T extends Tier>(
    tier: T,
    key: string,
    mutate: (payload: TierPayloadMap[T]) => TierPayloadMap[T],
    options: ReadOptions = {},
  ): Promise<MemoryRecord<T> | null> {
    return this.locks.run(
      lockKeys.record(tier, key),
      async () => {
        const existing = await this.readLive(tier, key, options.signal)
        if (!existing) return null

        const payload = this.validatePayload(tier, key, mutate(structuredClone(existing.payload)))
        const record: MemoryRecord<T> = {
          ...existing,
          payload,
          lastAccessedAt: this.now().toISOString(),
        }
        await this.writeRecord(record, options.signal)
        return record
      },
      options.signal,
    )
  }

  async delete(tier: Tier, key: string, options: ReadOptions = {}): Promise<boolean> {
    const store = this.keyed[tier]
    return this.locks.run(
      lockKeys.record(tier, key),
      () => this.storeCall(tier, key, 'delete', () => store.delete(key), options.signal),
      options.signal,
    )
  }

  /**
   * Append one interaction to a live conversation (creating it on first contact)
   */
  async recordInteraction(input: InteractionInput): Promise<MemoryRecord<'short_term'>> {
    const key = input.conversationId
    return this.locks.run(
      lockKeys.record('short_term', key),
      async () => {
        const existing = await this.readLive('short_term', key, input.signal)
        const previous = existing?.payload.kind === 'conversation' ? existing.payload.context : null
        if (existing && !previous) {
          throw new ValidationError(`Short-term record ${key} is not a conversation`, [], {
            context: { tier: 'short_term', key },
          })
        }
        if (previous && previous.leadId !== input.leadId) {
          throw new ValidationError(`Conversation ${key} belongs to lead ${previous.leadId}`, [], {
            context: { leadId: input.leadId, conversationId: key },
          })
        }
        const owner = this.ownerLookup(key) ?? previous?.currentAgent
        if (owner !== undefined && owner !== input.agentId) {
          throw new OwnershipError(`Conversation ${key} is owned by ${owner}, not ${input.agentId}`, {
            context: { leadId: input.leadId, conversationId: key },
          })
        }

        const now = this.now()
        const event: ConversationEvent = {
          eventId: generatePrefixedId('evt'),
          type: input.event?.type ?? 'agent_action',
          agentId: input.agentId,
          at: now.toISOString(),
          ...(input.event?.action !== undefined && { action: input.event.action }),
          ...(input.event?.concepts !== undefined && { concepts: input.event.concepts }),
          ...(input.event?.data !== undefined && { data: input.event.data }),
        }

        const concepts = [...(previous?.concepts ?? [])]
        for (const concept of input.concepts ?? []) {
          if (!concepts.some(c => c.name === concept.name)) concepts.push(concept)
        }

        const context: ConversationContext = {
          leadId: input.leadId,
          conversationId: key,
          currentAgent: owner ?? input.agentId,
          interactionCount: (previous?.interactionCount ?? 0) + 1,
          lastOutcomeScore: input.outcomeScore ?? previous?.lastOutcomeScore ?? 0,
          scenarioTag: input.scenarioTag ?? previous?.scenarioTag ?? DEFAULT_SCENARIO,
          status: input.status ?? previous?.status ?? 'active',
          preferences: { ...previous?.preferences, ...input.preferences },
          attributes: { ...previous?.attributes, ...input.attributes },
          concepts,
          history: [...(previous?.history ?? []), event],
        }
        const payload = this.validatePayload('short_term', key, { kind: 'conversation', context })

        const ttlSeconds = input.ttlSeconds ?? (existing ? undefined : this.config.defaultShortTermTtlSeconds)
        const expiresAt =
          ttlSeconds !== undefined
            ? new Date(now.getTime() + ttlSeconds * 1000).toISOString()
            : existing?.expiresAt

        const record: MemoryRecord<'short_term'> = {
          tier: 'short_term',
          key,
          payload,
          createdAt: existing?.createdAt ?? now.toISOString(),
          lastAccessedAt: now.toISOString(),
          expiresAt,
          tags: existing?.tags ?? defaultTags(payload),
        }
        await this.writeRecord(record, input.signal)
        return record
      },
      input.signal,
    )
  }

  /** Live conversation context, or null when absent or expired */
  async getConversation(conversationId: string, options: ReadOptions = {}): Promise<ConversationContext | null> {
    const record = await this.readLive('short_term', conversationId, options.signal)
    return record?.payload.kind === 'conversation' ? record.payload.context : null
  }

  // ── query ──

  /**
   * Lazy, restartable sequence of hits ordered by tier relevance.
   * Nothing is read until iteration starts; each iteration re-queries the store.
   */
  query<T extends Tier>(tier: T, criteria: TierCriteriaMap[T], options: ReadOptions = {}): AsyncIterable<QueryHit<T>> {
    const handler = this.queryHandlers[tier]
    return {
      [Symbol.asyncIterator]: () => handler(criteria, options.signal),
    }
  }

  private async *queryShortTerm(
    criteria: ShortTermCriteria,
    signal?: AbortSignal,
  ): AsyncGenerator<QueryHit<'short_term'>> {
    const store = this.stores.short_term
    const records = await this.storeCall('short_term', '*', 'scan', () => store.scan(), signal)
    const nowMs = this.now().getTime()
    const matches = records
      .filter(record => !isExpired(record, nowMs))
      .filter(record => {
        if (criteria.tag && !record.tags.includes(criteria.tag)) return false
        if (criteria.leadId) {
          return record.payload.kind === 'conversation' && record.payload.context.leadId === criteria.leadId
        }
        return true
      })
      .sort(byRecency)
      .slice(0, criteria.limit ?? Number.POSITIVE_INFINITY)

    for (const record of matches) {
      throwIfAborted(signal)
      yield { record, relevance: Date.parse(record.lastAccessedAt) }
    }
  }

  private async *queryLongTerm(criteria: LongTermCriteria, signal?: AbortSignal): AsyncGenerator<QueryHit<'long_term'>> {
    const store = this.stores.long_term
    const records = await this.storeCall('long_term', '*', 'find', () => store.find(criteria), signal)
    const matches = records.sort(byRecency).slice(0, criteria.limit ?? Number.POSITIVE_INFINITY)

    for (const record of matches) {
      throwIfAborted(signal)
      yield { record, relevance: Date.parse(record.lastAccessedAt) }
    }
  }

  private async *queryEpisodic(criteria: EpisodicCriteria, signal?: AbortSignal): AsyncGenerator<QueryHit<'episodic'>> {
    const store = this.stores.episodic
    if (criteria.fingerprint.length !== store.dimension) {
      throw new ValidationError(
        `Fingerprint has dimension ${criteria.fingerprint.length}, expected ${store.dimension}`,
      )
    }
    const hits = await this.storeCall(
      'episodic',
      '*',
      'nearest',
      () =>
        store.nearest(criteria.fingerprint, {
          limit: criteria.limit ?? DEFAULT_QUERY_LIMIT,
          minSimilarity: criteria.minSimilarity ?? this.thresholds.episodicQuerySimilarity,
          scenarioTag: criteria.scenarioTag,
          leadId: criteria.leadId,
        }),
      signal,
    )

    for (const hit of hits) {
      throwIfAborted(signal)
      yield { record: hit.record, relevance: hit.similarity }
    }
  }

  private async *querySemantic(criteria: SemanticCriteria, signal?: AbortSignal): AsyncGenerator<QueryHit<'semantic'>> {
    const store = this.stores.semantic
    const hits = await this.storeCall(
      'semantic',
      criteria.from,
      'traverse',
      () =>
        store.traverse(criteria.from, {
          maxDepth: criteria.maxDepth ?? this.config.semanticMaxDepth,
          relationTypes: criteria.relationTypes,
        }),
      signal,
    )

    for (const hit of hits) {
      throwIfAborted(signal)
      yield { record: hit.record, relevance: hit.depth }
    }
  }

  // ── Retrieval helpers ──

  /** Successful episodes whose context resembles this conversation */
  async findSimilarEpisodes(
    context: ConversationContext,
    options: { limit?: number; signal?: AbortSignal } = {},
  ): Promise<SimilarEpisode[]> {
    const fingerprint = computeFingerprint(context, this.stores.episodic.dimension)
    const results: SimilarEpisode[] = []
    const hits = this.query('episodic', { fingerprint, limit: options.limit ?? DEFAULT_QUERY_LIMIT }, options)
    for await (const hit of hits) {
      const { episode } = hit.record.payload
      if (episode.outcomeScore >= SUCCESS_OUTCOME) {
        results.push({ episode, similarity: hit.relevance })
      }
    }
    return results
  }

  /** Most recent successful episodes */
  async recentSuccesses(limit: number = DEFAULT_QUERY_LIMIT, options: ReadOptions = {}): Promise<Episode[]> {
    const store = this.stores.episodic
    const records = await this.storeCall('episodic', '*', 'list', () => store.list(), options.signal)
    return records
      .filter(record => record.payload.episode.outcomeScore >= SUCCESS_OUTCOME)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || a.key.localeCompare(b.key))
      .slice(0, limit)
      .map(record => record.payload.episode)
  }

  async shortestConceptPath(from: string, to: string, options: ReadOptions = {}): Promise<string[] | null> {
    const store = this.stores.semantic
    return this.storeCall('semantic', from, 'shortestPath', () => store.shortestPath(from, to), options.signal)
  }

  async getStatus(): Promise<MemoryStatus> {
    const tiers = await Promise.all([
      this.stores.short_term.status(),
      this.stores.long_term.status(),
      this.stores.episodic.status(),
      this.stores.semantic.status(),
    ])
    return { tiers, thresholds: { ...this.thresholds } }
  }

  async purgeExpired(options: ReadOptions = {}): Promise<number> {
    const store = this.stores.short_term
    const nowIso = this.now().toISOString()
    const purged = await this.storeCall('short_term', '*', 'purgeExpired', () => store.purgeExpired(nowIso), options.signal)
    if (purged > 0) logger.debug(`Purged ${purged} expired short-term records`)
    return purged
  }

  // ── Consolidation ──

  /**
   * Run the three rules in order. Safe to call concurrently or repeatedly:
   * each lead is processed under its lead lock and every rule is idempotent.
   */
  async consolidate(options: ReadOptions = {}): Promise<ConsolidationSummary> {
    const { signal } = options
    const startedAt = this.now().toISOString()
    const errors: ConsolidationError[] = []
    const byRule: Record<ConsolidationRule, RuleCounts> = {
      short_to_long: zeroCounts(),
      outcome_to_episodic: zeroCounts(),
      relation_to_semantic: zeroCounts(),
    }

    let expiredPurged = 0
    const purge = await fromPromise(this.purgeExpired({ signal }))
    if (purge.ok) {
      expiredPurged = purge.value
    } else if (purge.error instanceof CancelledError) {
      throw purge.error
    } else {
      logError(logger, 'Failed to purge expired short-term records', purge.error)
    }

    for (const rule of CONSOLIDATION_RULES) {
      throwIfAborted(signal)
      await this.runRule(rule, byRule[rule], errors, signal)
    }

    const totals = zeroCounts()
    for (const counts of Object.values(byRule)) {
      totals.migrated += counts.migrated
      totals.skipped += counts.skipped
      totals.failed += counts.failed
    }

    const summary: ConsolidationSummary = {
      ...totals,
      byRule,
      errors,
      expiredPurged,
      startedAt,
      finishedAt: this.now().toISOString(),
    }
    logger.info(
      `Consolidation finished: ${summary.migrated} migrated, ${summary.skipped} skipped, ${summary.failed} failed`,
    )
    await this.events.emit('consolidation.completed', { summary })
    return summary
  }

  private async runRule(
    rule: ConsolidationRule,
    counts: RuleCounts,
    errors: ConsolidationError[],
    signal?: AbortSignal,
  ): Promise<void> {
    const recordFailure = (key: string, error: AppError, leadId?: string) => {
      counts.failed++
      errors.push({ rule, key, message: error.message })
      logError(logger, `Consolidation rule ${rule} failed`, error, { key, leadId })
    }

    const listed = await fromPromise(this.liveConversations(signal))
    if (!listed.ok) {
      if (listed.error instanceof CancelledError) throw listed.error
      recordFailure('short_term:*', listed.error)
      return
    }

    const groups = groupByLead(listed.value)
    await Promise.all(
      Array.from(groups, ([leadId, contexts]) =>
        this.locks.run(
          lockKeys.lead(leadId),
          async () => {
            for (const context of contexts) {
              throwIfAborted(signal)
              for (const [key, task] of this.ruleTasks(rule, context, signal)) {
                const outcome = await fromPromise(task())
                if (outcome.ok) {
                  counts[outcome.value]++
                } else if (outcome.error instanceof CancelledError) {
                  throw outcome.error
                } else {
                  recordFailure(key, outcome.error, leadId)
                }
              }
            }
          },
          signal,
        ),
      ),
    )
  }

  /** Eligible candidates of one rule for one conversation, keyed by destination record */
  private ruleTasks(
    rule: ConsolidationRule,
    context: ConversationContext,
    signal?: AbortSignal,
  ): Array<[string, () => Promise<Candidate>]> {
    const { thresholds } = this
    switch (rule) {
      case 'short_to_long':
        if (context.interactionCount < thresholds.longTermInteractions) return []
        return [[memoryKeys.profile(context.leadId), () => this.foldIntoProfile(context, signal)]]
      case 'outcome_to_episodic':
        if (context.lastOutcomeScore < thresholds.episodicOutcome) return []
        return [[memoryKeys.episode(context.conversationId), () => this.recordEpisode(context, signal)]]
      case 'relation_to_semantic':
        if (context.status !== 'completed') return []
        return conceptPairs(context)
          .filter(pair => pair.strength >= thresholds.semanticStrength)
          .map((pair): [string, () => Promise<Candidate>] => {
            const key = memoryKeys.edge(pair.from.name, 'related_to', pair.to.name)
            return [key, () => this.reinforceEdge(key, pair, context, signal)]
          })
    }
  }

  private async liveConversations(signal?: AbortSignal): Promise<ConversationContext[]> {
    const store = this.stores.short_term
    const records = await this.storeCall('short_term', '*', 'scan', () => store.scan(), signal)
    const nowMs = this.now().getTime()
    const contexts: ConversationContext[] = []
    for (const record of records) {
      if (isExpired(record, nowMs)) continue
      if (record.payload.kind === 'conversation') contexts.push(record.payload.context)
    }
    return contexts
  }

  /** Rule 1: interactions → LeadProfile (merge, idempotent) */
  private async foldIntoProfile(context: ConversationContext, signal?: AbortSignal): Promise<Candidate> {
    const key = memoryKeys.profile(context.leadId)
    const profile = await this.locks.run(
      lockKeys.record('long_term', key),
      async () => {
        const existing = await this.readLive('long_term', key, signal)
        const current = existing?.payload.kind === 'lead_profile' ? existing.payload.profile : null
        const nowIso = this.now().toISOString()

        const folded = foldConversation(current, context, nowIso)
        if (!folded) return null

        await this.writeRecord(
          {
            tier: 'long_term',
            key,
            payload: { kind: 'lead_profile', profile: folded },
            createdAt: existing?.createdAt ?? nowIso,
            lastAccessedAt: nowIso,
            tags: existing?.tags ?? [`lead:${context.leadId}`],
          },
          signal,
        )
        return folded
      },
      signal,
    )
    if (!profile) return 'skipped'

    await this.events.emit('lead.processed', {
      leadId: context.leadId,
      conversationId: context.conversationId,
      rfmScore: profile.rfmScore,
      totalInteractions: profile.totalInteractions,
    })
    return 'migrated'
  }

  /** Rule 2: successful outcome → Episode, skipping duplicates */
  private async recordEpisode(context: ConversationContext, signal?: AbortSignal): Promise<Candidate> {
    const episode = buildEpisode(context, this.stores.episodic.dimension)
    const store = this.stores.episodic

    // 同场景的重复判定需要串行，否则并发的两个线索会各自写入近似情景
    return this.locks.run(
      lockKeys.record('episodic', `scenario:${episode.scenarioTag}`),
      async () => {
        if (await this.readLive('episodic', episode.episodeId, signal)) return 'skipped'

        const duplicates = await this.storeCall(
          'episodic',
          episode.episodeId,
          'nearest',
          () =>
            store.nearest(episode.contextFingerprint, {
              limit: 1,
              minSimilarity: this.thresholds.duplicateEpisodeSimilarity,
              scenarioTag: episode.scenarioTag,
            }),
          signal,
        )
        if (duplicates.length > 0) {
          logger.debug(`Episode ${episode.episodeId} duplicates ${duplicates[0]?.record.key ?? '?'}`)
          return 'skipped'
        }

        const nowIso = this.now().toISOString()
        await this.writeRecord(
          {
            tier: 'episodic',
            key: episode.episodeId,
            payload: { kind: 'episode', episode },
            createdAt: nowIso,
            lastAccessedAt: nowIso,
            tags: episodeTags(episode),
          },
          signal,
        )
        return 'migrated'
      },
      signal,
    )
  }

  /** Rule 3: co-occurring concepts → ConceptEdge via EMA */
  private async reinforceEdge(
    key: string,
    pair: ConceptPair,
    context: ConversationContext,
    signal?: AbortSignal,
  ): Promise<Candidate> {
    // 边被多个线索共享，读改写要在记录锁内完成
    return this.locks.run(
      lockKeys.record('semantic', key),
      async () => {
        const nowIso = this.now().toISOString()
        for (const concept of [pair.from, pair.to]) {
          const conceptKey = memoryKeys.concept(concept.name)
          if (!(await this.readLive('semantic', conceptKey, signal))) {
            await this.writeRecord(
              {
                tier: 'semantic',
                key: conceptKey,
                payload: { kind: 'concept', node: concept },
                createdAt: nowIso,
                lastAccessedAt: nowIso,
                tags: [],
              },
              signal,
            )
          }
        }

        const existing = await this.readLive('semantic', key, signal)
        const current = existing?.payload.kind === 'edge' ? existing.payload.edge : null
        const edge = strengthenEdge(current, pair, context.conversationId, this.config.emaAlpha, nowIso)
        if (!edge) return 'skipped'

        await this.writeRecord(
          {
            tier: 'semantic',
            key,
            payload: { kind: 'edge', edge },
            createdAt: existing?.createdAt ?? nowIso,
            lastAccessedAt: nowIso,
            tags: existing?.tags ?? [],
          },
          signal,
        )
        return 'migrated'
      },
      signal,
    )
  }
}
