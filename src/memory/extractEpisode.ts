/**
 * Successful outcome → episodic — build an Episode from a conversation
 */

import { agentActions, computeFingerprint } from './fingerprint.js'
import { memoryKeys, type ConversationContext, type Episode } from './types.js'

export function episodeTags(episode: Episode): string[] {
  return [`lead:${episode.metadata.leadId}`, `scenario:${episode.scenarioTag}`]
}

export function buildEpisode(context: ConversationContext, dimension: number): Episode {
  const agentIds = [...new Set(context.history.map(event => event.agentId))]
  return {
    episodeId: memoryKeys.episode(context.conversationId),
    scenarioTag: context.scenarioTag,
    contextFingerprint: computeFingerprint(context, dimension),
    actionSequence: agentActions(context),
    outcomeScore: context.lastOutcomeScore,
    metadata: {
      leadId: context.leadId,
      conversationId: context.conversationId,
      agentIds,
    },
  }
}
