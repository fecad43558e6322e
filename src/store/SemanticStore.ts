/**
 * 语义记忆存储：概念图谱
 *
 * - 节点/边 upsert，写边时自动补齐缺失的端点概念
 * - BFS 有界深度遍历，对称关系（related_to）双向可达
 * - 无权最短路径
 */

import { memoryKeys, type ConceptEdge, type MemoryRecord } from '../memory/types.js'
import { InMemoryTierStore } from './InMemoryTierStore.js'
import type { SemanticTierStore, TraversalHit, TraverseOptions } from './types.js'

type SemanticRecord = MemoryRecord<'semantic'>

export const UNCATEGORIZED = 'uncategorized'

/** 无方向的关系，遍历时两端互通 */
export const SYMMETRIC_RELATIONS = new Set(['related_to'])

interface Neighbor {
  concept: string
  relationType: string
}

export class InMemorySemanticStore extends InMemoryTierStore<'semantic'> implements SemanticTierStore {
  constructor() {
    super('semantic')
  }

  override async write(record: SemanticRecord): Promise<void> {
    const { payload } = record
    if (payload.kind === 'edge') {
      for (const name of [payload.edge.fromConcept, payload.edge.toConcept]) {
        const key = memoryKeys.concept(name)
        if (!this.records.has(key)) {
          this.records.set(key, {
            tier: 'semantic',
            key,
            payload: { kind: 'concept', node: { name, category: UNCATEGORIZED } },
            createdAt: record.createdAt,
            lastAccessedAt: record.createdAt,
            tags: [],
          })
        }
      }
    }
    await super.write(record)
  }

  private edges(): ConceptEdge[] {
    const edges: ConceptEdge[] = []
    for (const record of this.records.values()) {
      if (record.payload.kind === 'edge') edges.push(record.payload.edge)
    }
    return edges
  }

  /** 邻接表，邻居按概念名排序保证遍历顺序确定 */
  private adjacency(relationTypes?: string[]): Map<string, Neighbor[]> {
    const allowed = relationTypes && relationTypes.length > 0 ? new Set(relationTypes) : null
    const adjacency = new Map<string, Neighbor[]>()
    const link = (from: string, to: string, relationType: string) => {
      const list = adjacency.get(from) ?? []
      list.push({ concept: to, relationType })
      adjacency.set(from, list)
    }

    for (const edge of this.edges()) {
      if (allowed && !allowed.has(edge.relationType)) continue
      link(edge.fromConcept, edge.toConcept, edge.relationType)
      if (SYMMETRIC_RELATIONS.has(edge.relationType)) {
        link(edge.toConcept, edge.fromConcept, edge.relationType)
      }
    }
    for (const list of adjacency.values()) {
      list.sort((a, b) => a.concept.localeCompare(b.concept) || a.relationType.localeCompare(b.relationType))
    }
    return adjacency
  }

  async traverse(from: string, options: TraverseOptions): Promise<TraversalHit[]> {
    if (!this.records.has(memoryKeys.concept(from))) return []

    const adjacency = this.adjacency(options.relationTypes)
    const visited = new Set<string>([from])
    const hits: TraversalHit[] = []
    let frontier: Array<{ concept: string; path: string[] }> = [{ concept: from, path: [] }]

    for (let depth = 1; depth <= options.maxDepth && frontier.length > 0; depth++) {
      const next: Array<{ concept: string; path: string[] }> = []
      for (const { concept, path } of frontier) {
        for (const neighbor of adjacency.get(concept) ?? []) {
          if (visited.has(neighbor.concept)) continue
          visited.add(neighbor.concept)
          const neighborPath = [...path, neighbor.relationType]
          const record = this.records.get(memoryKeys.concept(neighbor.concept))
          if (record) {
            hits.push({ record: structuredClone(record), depth, path: neighborPath })
          }
          next.push({ concept: neighbor.concept, path: neighborPath })
        }
      }
      frontier = next
    }
    return hits
  }

  async shortestPath(from: string, to: string): Promise<string[] | null> {
    if (!this.records.has(memoryKeys.concept(from)) || !this.records.has(memoryKeys.concept(to))) {
      return null
    }
    if (from === to) return [from]

    const adjacency = this.adjacency()
    const previous = new Map<string, string>()
    const visited = new Set<string>([from])
    const queue: string[] = [from]

    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      for (const neighbor of adjacency.get(current) ?? []) {
        if (visited.has(neighbor.concept)) continue
        visited.add(neighbor.concept)
        previous.set(neighbor.concept, current)
        if (neighbor.concept === to) {
          const path = [to]
          let step = previous.get(to)
          while (step !== undefined) {
            path.unshift(step)
            step = previous.get(step)
          }
          return path
        }
        queue.push(neighbor.concept)
      }
    }
    return null
  }

  async edgesOf(concept: string): Promise<ConceptEdge[]> {
    return this.edges()
      .filter(edge => edge.fromConcept === concept || edge.toConcept === concept)
      .map(edge => structuredClone(edge))
  }
}
