import { redis } from '@/shared/clients/redis-client.js'
import { AppConfig, loadConfig } from '@/shared/config/env.js'
import { RedisVectorRepository } from '@/repositories/redis/redis-vector-repository.js'
import { BatchingStrategy } from '@/vector-store/batching/batching-strategy.js'
import { FixedSizeBatchingStrategy } from '@/vector-store/batching/fixed-size-batching-strategy.js'
import { TokenCountBatchingStrategy } from '@/vector-store/batching/token-count-batching-strategy.js'
import { RedisVectorStore } from '@/vector-store/redis-vector-store.js'
import { makeOllamaProvider } from './make-chat-with-functions.js'

export function makeBatchingStrategy(
  config: AppConfig['vectorStore']
): BatchingStrategy {
  return config.batchingStrategy === 'FIXED_SIZE'
    ? new FixedSizeBatchingStrategy(config.batchSize)
    : new TokenCountBatchingStrategy({
        maxInputTokenCount: config.maxInputTokenCount
      })
}

export async function makeRedisVectorStore(
  config: AppConfig = loadConfig()
): Promise<RedisVectorStore> {
  const { vectorStore } = config
  const client = await redis(config.redisUrl)

  const repository = new RedisVectorRepository(client, {
    indexName: vectorStore.indexName,
    prefix: vectorStore.prefix,
    contentFieldName: 'content',
    embeddingFieldName: 'embedding',
    metadataFields: vectorStore.metadataFields,
    algorithm: vectorStore.algorithm,
    distanceMetric: vectorStore.distanceMetric
  })

  const store = new RedisVectorStore(repository, makeOllamaProvider(config), {
    metadataFields: vectorStore.metadataFields,
    initializeSchema: vectorStore.initializeSchema,
    dimensions: vectorStore.dimensions,
    batchingStrategy: makeBatchingStrategy(vectorStore)
  })
  await store.initialize()
  return store
}
