/**
 * 按配置组装四个层级存储
 */

import type { MemoryConfig } from '../config/schema.js'
import { assertNever } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { InMemoryEpisodicStore } from './EpisodicStore.js'
import { FileLongTermStore, InMemoryLongTermStore } from './LongTermStore.js'
import { InMemorySemanticStore } from './SemanticStore.js'
import { InMemoryShortTermStore } from './ShortTermStore.js'
import { getDataDir, getLongTermDir } from './paths.js'
import type { LongTermTierStore, TierStores } from './types.js'

const logger = createLogger('store')

export function createLongTermStore(config: MemoryConfig['longTerm'], dataDir: string = getDataDir()): LongTermTierStore {
  switch (config.backend) {
    case 'memory':
      return new InMemoryLongTermStore()
    case 'file':
      return new FileLongTermStore(config.location ?? getLongTermDir(dataDir))
    default:
      return assertNever(config.backend)
  }
}

export function createTierStores(config: MemoryConfig, dataDir?: string): TierStores {
  const stores: TierStores = {
    short_term: new InMemoryShortTermStore(),
    long_term: createLongTermStore(config.longTerm, dataDir),
    episodic: new InMemoryEpisodicStore(config.fingerprintDimension),
    semantic: new InMemorySemanticStore(),
  }
  logger.debug(`Tier stores ready (long-term backend: ${config.longTerm.backend})`)
  return stores
}
