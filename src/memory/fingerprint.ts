/**
 * Context fingerprint — feature-hashed vector of a conversation
 *
 * Features (scenario, attributes, preferences, agent actions) are hashed with
 * FNV-1a into a fixed number of buckets, then L2-normalised so that cosine
 * similarity compares shape rather than volume.
 */

import { normalize } from '../store/vectorMath.js'
import type { ConversationContext } from './types.js'

const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

export function fnv1a(text: string): number {
  let hash = FNV_OFFSET_BASIS
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return hash >>> 0
}

/** Actions of agent_action events, in history order */
export function agentActions(context: ConversationContext): string[] {
  const actions: string[] = []
  for (const event of context.history) {
    if (event.type === 'agent_action' && event.action) actions.push(event.action)
  }
  return actions
}

export function contextFeatures(context: ConversationContext): string[] {
  const features = [`scenario:${context.scenarioTag}`]

  for (const [key, value] of Object.entries(context.attributes)) {
    features.push(`attr:${key}=${String(value)}`)
  }
  for (const [key, value] of Object.entries(context.preferences)) {
    if (Array.isArray(value)) {
      for (const item of value) features.push(`pref:${key}=${item}`)
    } else {
      features.push(`pref:${key}=${String(value)}`)
    }
  }
  for (const action of agentActions(context)) {
    features.push(`action:${action}`)
  }
  return features
}

export function computeFingerprint(context: ConversationContext, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0)
  for (const feature of contextFeatures(context)) {
    const bucket = fnv1a(feature) % dimension
    vector[bucket] = (vector[bucket] ?? 0) + 1
  }
  return normalize(vector)
}
