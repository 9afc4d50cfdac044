import { RediSearchSchema } from 'redis'
import { getLogger } from '@/shared/logger/get-logger.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'
import {
  VectorRecord,
  SearchQuery,
  SearchResult
} from '../types/vector-repository-dto.js'
import { VectorRepository } from '../vector-repository.js'
import {
  RedisIndexOptions,
  RedisJsonDocument,
  SCORE_FIELD,
  buildIndexSchema,
  buildKnnQuery,
  keyFor,
  parseSearchDocument,
  queryParams,
  returnFields,
  toJsonDocument
} from './redis-query-builder.js'

const logger = getLogger()

export const DELETE_BY_FILTER_PAGE_SIZE = 1000

export interface RedisSearchOptions {
  PARAMS?: Record<string, Buffer>
  RETURN?: string[]
  SORTBY?: { BY: string; DIRECTION: 'ASC' | 'DESC' }
  LIMIT?: { from: number; size: number }
  DIALECT?: number
}

export interface RedisSearchReply {
  total: number
  documents: Array<{ id: string; value: Record<string, unknown> }>
}

export interface RedisJsonPipeline {
  json: {
    set(key: string, path: string, json: RedisJsonDocument): unknown
  }
  exec(): Promise<unknown>
}

/** The part of a node-redis client the repository calls. */
export interface RedisVectorClient {
  ft: {
    _list(): Promise<string[]>
    create(
      index: string,
      schema: RediSearchSchema,
      options: { ON: 'JSON'; PREFIX: string }
    ): Promise<unknown>
    search(
      index: string,
      query: string,
      options: RedisSearchOptions
    ): Promise<RedisSearchReply>
    info(index: string): Promise<{ numDocs: string | number }>
  }
  multi(): RedisJsonPipeline
  del(keys: string[]): Promise<number>
}

export class RedisVectorRepository implements VectorRepository {
  constructor(
    private readonly client: RedisVectorClient,
    private readonly options: RedisIndexOptions
  ) {}

  get indexName(): string {
    return this.options.indexName
  }

  async indexExists(): Promise<boolean> {
    try {
      const indexes = await this.client.ft._list()
      return indexes.includes(this.indexName)
    } catch (error) {
      throw this.integrationError('list indexes', error)
    }
  }

  async createIndex(dimensions: number): Promise<void> {
    try {
      logger.info('Creating Redis search index', {
        indexName: this.indexName,
        prefix: this.options.prefix,
        dimensions,
        algorithm: this.options.algorithm,
        distanceMetric: this.options.distanceMetric,
        metadataFields: this.options.metadataFields
      })

      await this.client.ft.create(
        this.indexName,
        buildIndexSchema(this.options, dimensions),
        {
          ON: 'JSON',
          PREFIX: this.options.prefix
        }
      )

      logger.info('Successfully created Redis search index', {
        indexName: this.indexName
      })
    } catch (error) {
      throw this.integrationError('create index', error, { dimensions })
    }
  }

  async upsert(vectors: VectorRecord[]): Promise<void> {
    if (vectors.length === 0) {
      return
    }
    try {
      logger.info('Upserting vectors to Redis', {
        vectorCount: vectors.length,
        indexName: this.indexName
      })

      const pipeline = this.client.multi()
      for (const vector of vectors) {
        pipeline.json.set(
          keyFor(vector.id, this.options.prefix),
          '$',
          toJsonDocument(vector, this.options)
        )
      }
      await pipeline.exec()

      logger.info('Successfully upserted vectors to Redis', {
        vectorCount: vectors.length,
        indexName: this.indexName
      })
    } catch (error) {
      throw this.integrationError('upsert vectors', error, {
        vectorCount: vectors.length
      })
    }
  }

  async search(query: SearchQuery): Promise<SearchResult[]> {
    try {
      const nativeQuery = buildKnnQuery(
        query.filter,
        query.topK,
        this.options.embeddingFieldName
      )

      logger.info('Searching vectors in Redis index', {
        indexName: this.indexName,
        topK: query.topK,
        query: nativeQuery
      })

      const reply = await this.client.ft.search(this.indexName, nativeQuery, {
        PARAMS: queryParams(query.vector),
        RETURN: returnFields(this.options),
        SORTBY: { BY: SCORE_FIELD, DIRECTION: 'ASC' },
        LIMIT: { from: 0, size: query.topK },
        DIALECT: 2
      })

      const results = reply.documents.map((document) =>
        parseSearchDocument(document, this.options)
      )

      logger.info('Successfully searched vectors in Redis', {
        indexName: this.indexName,
        resultsCount: results.length,
        topK: query.topK
      })
      return results
    } catch (error) {
      throw this.integrationError('search vectors', error, { topK: query.topK })
    }
  }

  async deleteByIds(ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0
    }
    try {
      logger.info('Deleting vectors by ID from Redis', {
        vectorCount: ids.length,
        indexName: this.indexName
      })

      const deleted = await this.client.del(
        ids.map((id) => keyFor(id, this.options.prefix))
      )

      logger.info('Successfully deleted vectors by ID from Redis', {
        requested: ids.length,
        deleted,
        indexName: this.indexName
      })
      return deleted
    } catch (error) {
      throw this.integrationError('delete vectors', error, {
        vectorCount: ids.length
      })
    }
  }

  async deleteByFilter(filter: string): Promise<number> {
    try {
      logger.info('Deleting vectors by filter from Redis', {
        filter,
        indexName: this.indexName
      })

      let deleted = 0
      for (;;) {
        const reply = await this.client.ft.search(this.indexName, filter, {
          RETURN: [],
          LIMIT: { from: 0, size: DELETE_BY_FILTER_PAGE_SIZE },
          DIALECT: 2
        })
        if (reply.documents.length === 0) {
          break
        }
        deleted += await this.client.del(
          reply.documents.map((document) => document.id)
        )
        if (reply.documents.length < DELETE_BY_FILTER_PAGE_SIZE) {
          break
        }
      }

      logger.info('Successfully deleted vectors by filter from Redis', {
        filter,
        deleted,
        indexName: this.indexName
      })
      return deleted
    } catch (error) {
      throw this.integrationError('delete vectors by filter', error, { filter })
    }
  }

  async getStats(): Promise<{ totalVectors: number }> {
    try {
      const info = await this.client.ft.info(this.indexName)
      const totalVectors = Number(info.numDocs) || 0

      logger.info('Successfully retrieved Redis index stats', {
        indexName: this.indexName,
        totalVectors
      })
      return { totalVectors }
    } catch (error) {
      throw this.integrationError('get index stats', error)
    }
  }

  private integrationError(
    action: string,
    error: unknown,
    details: Record<string, unknown> = {}
  ): IntegrationError {
    const originalError = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Error trying to ${action} in Redis`, {
      error: originalError,
      indexName: this.indexName,
      ...details
    })
    return new IntegrationError(
      `Failed to ${action} for Redis index ${this.indexName}`,
      {
        service: 'redis',
        indexName: this.indexName,
        ...details,
        originalError
      }
    )
  }
}
