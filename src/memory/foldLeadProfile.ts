/**
 * Short-term → long-term — fold a conversation into the lead's profile
 *
 * Merge, never overwrite: numbers are weighted-averaged by interaction count,
 * arrays are unioned, other values take the latest. Folding is idempotent via
 * `foldedInteractions` (conversationId → interactions already folded).
 */

import { differenceInDays, parseISO } from 'date-fns'
import type {
  ConversationContext,
  InteractionSummary,
  LeadProfile,
  PreferenceValue,
} from './types.js'

// ── Preferences ──

function mergePreferenceValue(
  existing: PreferenceValue | undefined,
  incoming: PreferenceValue,
  existingWeight: number,
  incomingWeight: number,
): PreferenceValue {
  if (typeof existing === 'number' && typeof incoming === 'number') {
    const total = existingWeight + incomingWeight
    if (total === 0) return incoming
    return (existing * existingWeight + incoming * incomingWeight) / total
  }
  if (Array.isArray(existing) && Array.isArray(incoming)) {
    return [...new Set([...existing, ...incoming])]
  }
  return incoming
}

export function mergePreferences(
  existing: Record<string, PreferenceValue>,
  incoming: Record<string, PreferenceValue>,
  existingWeight: number,
  incomingWeight: number,
): Record<string, PreferenceValue> {
  const merged: Record<string, PreferenceValue> = { ...existing }
  for (const [key, value] of Object.entries(incoming)) {
    merged[key] = mergePreferenceValue(existing[key], value, existingWeight, incomingWeight)
  }
  return merged
}

// ── Summaries & RFM ──

export function summarizeInteraction(attributes: ConversationContext['attributes']): string {
  const parts: string[] = []
  if (attributes.leadSource !== undefined) parts.push(`Source: ${String(attributes.leadSource)}`)
  if (attributes.interactionType !== undefined) parts.push(`Type: ${String(attributes.interactionType)}`)
  if (attributes.outcome !== undefined) parts.push(`Outcome: ${String(attributes.outcome)}`)
  return parts.length > 0 ? parts.join(' | ') : 'General interaction'
}

const RECENCY_WINDOW_DAYS = 30
const FREQUENCY_SATURATION = 10
const MONETARY_BASELINE = 0.5

/**
 * RFM = mean(recency, frequency, monetary), rounded to 3 decimals
 * - recency: 1 today, falling linearly to 0 after 30 days
 * - frequency: saturates at 10 summaries
 * - monetary: fixed baseline until deal values are tracked
 */
export function computeRfmScore(summaries: InteractionSummary[], nowIso: string): number {
  if (summaries.length === 0) return 0
  const latest = summaries.reduce((a, b) => (a.recordedAt >= b.recordedAt ? a : b))
  const days = Math.max(0, differenceInDays(parseISO(nowIso), parseISO(latest.recordedAt)))
  const recency = Math.max(0, 1 - days / RECENCY_WINDOW_DAYS)
  const frequency = Math.min(1, summaries.length / FREQUENCY_SATURATION)
  return Math.round(((recency + frequency + MONETARY_BASELINE) / 3) * 1000) / 1000
}

// ── Fold ──

export function emptyProfile(leadId: string, nowIso: string): LeadProfile {
  return {
    leadId,
    preferences: {},
    rfmScore: 0,
    interactionSummaries: [],
    foldedInteractions: {},
    totalInteractions: 0,
    updatedAt: nowIso,
  }
}

/**
 * @returns the merged profile, or null when every interaction is already folded
 */
export function foldConversation(
  existing: LeadProfile | null,
  context: ConversationContext,
  nowIso: string,
): LeadProfile | null {
  const base = existing ?? emptyProfile(context.leadId, nowIso)
  const alreadyFolded = base.foldedInteractions[context.conversationId] ?? 0
  const delta = context.interactionCount - alreadyFolded
  if (delta <= 0) return null

  const lastEvent = context.history[context.history.length - 1]
  const summary: InteractionSummary = {
    conversationId: context.conversationId,
    interactionCount: context.interactionCount,
    outcomeScore: context.lastOutcomeScore,
    scenarioTag: context.scenarioTag,
    summary: summarizeInteraction(context.attributes),
    recordedAt: lastEvent?.at ?? nowIso,
  }
  const interactionSummaries = [
    ...base.interactionSummaries.filter(s => s.conversationId !== context.conversationId),
    summary,
  ]

  return {
    leadId: base.leadId,
    preferences: mergePreferences(base.preferences, context.preferences, base.totalInteractions, delta),
    rfmScore: computeRfmScore(interactionSummaries, nowIso),
    interactionSummaries,
    foldedInteractions: { ...base.foldedInteractions, [context.conversationId]: context.interactionCount },
    totalInteractions: base.totalInteractions + delta,
    updatedAt: nowIso,
  }
}
