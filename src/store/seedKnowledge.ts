/**
 * 语义图谱种子数据
 * 从 JSON 文件载入领域常识（渠道 → 策略 → 结果），只补写不存在的记录
 */

import { z } from 'zod'
import { readJson } from './readWriteJson.js'
import { conceptRefSchema, memoryKeys } from '../memory/types.js'
import { NotFoundError } from '../shared/error.js'
import type { SemanticTierStore } from './types.js'

export const seedKnowledgeSchema = z.object({
  nodes: z.array(conceptRefSchema),
  edges: z.array(
    z.object({
      from: z.string().min(1),
      to: z.string().min(1),
      relationType: z.string().min(1),
      strength: z.number().min(0).max(1),
    })
  ),
})
export type SeedKnowledge = z.infer<typeof seedKnowledgeSchema>

export function loadSeedFile(filepath: string): SeedKnowledge {
  const seed = readJson(filepath, seedKnowledgeSchema)
  if (!seed) {
    throw new NotFoundError('Seed knowledge file', filepath)
  }
  return seed
}

/**
 * 写入种子节点与边
 * @returns 实际新写入的记录数
 */
export async function seedSemanticStore(
  store: SemanticTierStore,
  seed: SeedKnowledge,
  nowIso: string
): Promise<number> {
  let written = 0

  for (const node of seed.nodes) {
    const key = memoryKeys.concept(node.name)
    if (await store.read(key)) continue
    await store.write({
      tier: 'semantic',
      key,
      payload: { kind: 'concept', node },
      createdAt: nowIso,
      lastAccessedAt: nowIso,
      tags: ['seed'],
    })
    written++
  }

  for (const edge of seed.edges) {
    const key = memoryKeys.edge(edge.from, edge.relationType, edge.to)
    if (await store.read(key)) continue
    await store.write({
      tier: 'semantic',
      key,
      payload: {
        kind: 'edge',
        edge: {
          fromConcept: edge.from,
          toConcept: edge.to,
          relationType: edge.relationType,
          strength: edge.strength,
          observations: 1,
          sourceConversations: [],
          updatedAt: nowIso,
        },
      },
      createdAt: nowIso,
      lastAccessedAt: nowIso,
      tags: ['seed'],
    })
    written++
  }

  return written
}
