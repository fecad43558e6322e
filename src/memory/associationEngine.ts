/**
 * Association engine — concept co-occurrence → semantic edges
 *
 * - collectConcepts: declared concepts plus lead source / outcome attributes
 * - conceptPairs: pair strength from the conversation outcome and co-occurrence
 * - strengthenEdge: exponential moving average, once per conversation
 */

import type { ConceptEdge, ConceptRef, ConversationContext } from './types.js'

export const CO_OCCURRENCE_RELATION = 'related_to'

/** Pairs seen together in a single event count fully; same-conversation pairs are discounted */
const SAME_EVENT_WEIGHT = 1
const SAME_CONVERSATION_WEIGHT = 0.9

export interface ConceptPair {
  from: ConceptRef
  to: ConceptRef
  strength: number
}

export function collectConcepts(context: ConversationContext): ConceptRef[] {
  const byName = new Map<string, ConceptRef>()
  const add = (concept: ConceptRef) => {
    if (!byName.has(concept.name)) byName.set(concept.name, concept)
  }

  for (const concept of context.concepts) add(concept)
  const { leadSource, outcome } = context.attributes
  if (typeof leadSource === 'string' && leadSource) add({ name: leadSource, category: 'channel' })
  if (typeof outcome === 'string' && outcome) add({ name: outcome, category: 'outcome' })

  return [...byName.values()]
}

function coOccurInEvent(context: ConversationContext, a: string, b: string): boolean {
  return context.history.some(event => {
    const concepts = event.concepts ?? []
    return concepts.includes(a) && concepts.includes(b)
  })
}

/**
 * Undirected pairs, ordered so that `from.name < to.name`
 */
export function conceptPairs(context: ConversationContext): ConceptPair[] {
  const concepts = collectConcepts(context).sort((a, b) => a.name.localeCompare(b.name))
  const pairs: ConceptPair[] = []

  for (let i = 0; i < concepts.length; i++) {
    for (let j = i + 1; j < concepts.length; j++) {
      const from = concepts[i]
      const to = concepts[j]
      if (!from || !to) continue
      const weight = coOccurInEvent(context, from.name, to.name) ? SAME_EVENT_WEIGHT : SAME_CONVERSATION_WEIGHT
      pairs.push({ from, to, strength: context.lastOutcomeScore * weight })
    }
  }
  return pairs
}

export function applyEma(previous: number, observed: number, alpha: number): number {
  return alpha * observed + (1 - alpha) * previous
}

/**
 * @returns the new edge, or null when this conversation already contributed to it
 */
export function strengthenEdge(
  existing: ConceptEdge | null,
  pair: ConceptPair,
  conversationId: string,
  alpha: number,
  nowIso: string,
): ConceptEdge | null {
  if (!existing) {
    return {
      fromConcept: pair.from.name,
      toConcept: pair.to.name,
      relationType: CO_OCCURRENCE_RELATION,
      strength: pair.strength,
      observations: 1,
      sourceConversations: [conversationId],
      updatedAt: nowIso,
    }
  }
  if (existing.sourceConversations.includes(conversationId)) return null

  return {
    ...existing,
    strength: applyEma(existing.strength, pair.strength, alpha),
    observations: existing.observations + 1,
    sourceConversations: [...existing.sourceConversations, conversationId],
    updatedAt: nowIso,
  }
}
