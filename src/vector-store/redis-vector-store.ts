import { randomUUID } from 'crypto'
import { EmbeddingProvider } from '@/providers/ai/ai-provider.js'
import { VectorRepository } from '@/repositories/vector-repository.js'
import { VectorRecord } from '@/repositories/types/vector-repository-dto.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { ValidationError } from '@/shared/errors/validation-error.js'
import { SchemaNotInitializedError } from '@/shared/errors/vector-store-errors.js'
import { BatchingStrategy } from './batching/batching-strategy.js'
import { TokenCountBatchingStrategy } from './batching/token-count-batching-strategy.js'
import { FilterExpression } from './filters/filter-expression.js'
import { parseFilterExpression } from './filters/filter-expression-parser.js'
import { RedisFilterExpressionConverter } from './filters/redis-filter-converter.js'
import {
  Document,
  MetadataField,
  SimilaritySearchRequest,
  SimilaritySearchResult
} from './vector-store-dtos.js'

const logger = getLogger()

export const DEFAULT_TOP_K = 4

// Embedded once to learn the model's vector size when none is configured.
const DIMENSION_PROBE_TEXT = 'Test String'

export interface RedisVectorStoreOptions {
  metadataFields: MetadataField[]
  initializeSchema?: boolean
  dimensions?: number
  batchingStrategy?: BatchingStrategy
}

export class RedisVectorStore {
  private readonly converter: RedisFilterExpressionConverter
  private readonly batchingStrategy: BatchingStrategy
  private readonly initializeSchema: boolean
  private schemaReady: Promise<void> | null = null

  constructor(
    private readonly repository: VectorRepository,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly options: RedisVectorStoreOptions
  ) {
    this.converter = new RedisFilterExpressionConverter(options.metadataFields)
    this.batchingStrategy =
      options.batchingStrategy ?? new TokenCountBatchingStrategy()
    this.initializeSchema = options.initializeSchema ?? false
  }

  /** Creates the index up front when schema initialization is enabled. */
  async initialize(): Promise<void> {
    if (!this.initializeSchema) {
      return
    }
    await this.ensureSchema()
  }

  async add(documents: Document[]): Promise<string[]> {
    if (documents.length === 0) {
      return []
    }
    await this.ensureSchema()

    const withIds = documents.map((document) => ({
      ...document,
      id: document.id ?? randomUUID()
    }))
    const batches = this.batchingStrategy.batch(withIds)

    logger.info('Adding documents to vector store', {
      indexName: this.repository.indexName,
      documentCount: withIds.length,
      batchCount: batches.length
    })

    for (const batch of batches) {
      const embeddings = await this.embeddingProvider.generateEmbeddings(
        batch.map((document) => document.content)
      )
      const records: VectorRecord[] = batch.map((document, index) => ({
        id: document.id,
        values: embeddings[index],
        content: document.content,
        metadata: document.metadata ?? {}
      }))
      await this.repository.upsert(records)
    }

    return withIds.map((document) => document.id)
  }

  async delete(ids: string[]): Promise<number> {
    return this.repository.deleteByIds(ids)
  }

  async deleteByFilter(filterExpression: string | FilterExpression): Promise<number> {
    const filter = this.translateFilter(filterExpression)
    return this.repository.deleteByFilter(filter)
  }

  async similaritySearch(
    request: SimilaritySearchRequest
  ): Promise<SimilaritySearchResult[]> {
    const topK = request.topK ?? DEFAULT_TOP_K
    const similarityThreshold = request.similarityThreshold ?? 0

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('topK must be a positive integer')
    }
    if (!(similarityThreshold >= 0 && similarityThreshold <= 1)) {
      throw new ValidationError('similarityThreshold must be between 0 and 1')
    }

    // Translated before the query is embedded.
    const filter =
      request.filterExpression === undefined
        ? undefined
        : this.translateFilter(request.filterExpression)

    const vector = await this.embeddingProvider.generateEmbedding(request.query)
    const matches = await this.repository.search({ vector, topK, filter })

    const results = matches
      .filter((match) => match.score >= similarityThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((match) => ({
        id: match.id,
        content: match.content,
        metadata: match.metadata,
        score: match.score,
        distance: match.distance
      }))

    logger.info('Similarity search completed', {
      indexName: this.repository.indexName,
      topK,
      similarityThreshold,
      filter,
      candidates: matches.length,
      resultsCount: results.length
    })

    return results
  }

  async getStats(): Promise<{ totalVectors: number }> {
    return this.repository.getStats()
  }

  /** Native query string for an expression, without touching Redis. */
  translateFilter(filterExpression: string | FilterExpression): string {
    const expression =
      typeof filterExpression === 'string'
        ? parseFilterExpression(filterExpression)
        : filterExpression
    return this.converter.convert(expression)
  }

  // Concurrent callers share one check; a failed attempt is not cached.
  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.prepareSchema().catch((error: unknown) => {
        this.schemaReady = null
        throw error
      })
    }
    return this.schemaReady
  }

  private async prepareSchema(): Promise<void> {
    if (await this.repository.indexExists()) {
      return
    }
    if (!this.initializeSchema) {
      throw new SchemaNotInitializedError(this.repository.indexName)
    }
    const dimensions =
      this.options.dimensions ??
      (await this.embeddingProvider.generateEmbedding(DIMENSION_PROBE_TEXT)).length
    await this.repository.createIndex(dimensions)
  }
}
