import { RediSearchSchema } from 'redis'
import {
  DELETE_BY_FILTER_PAGE_SIZE,
  RedisJsonPipeline,
  RedisSearchOptions,
  RedisSearchReply,
  RedisVectorClient,
  RedisVectorRepository
} from '@/repositories/redis/redis-vector-repository.js'
import {
  RedisIndexOptions,
  RedisJsonDocument,
  buildIndexSchema,
  toFloat32Buffer
} from '@/repositories/redis/redis-query-builder.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'

const options: RedisIndexOptions = {
  indexName: 'docs-index',
  prefix: 'embedding:',
  contentFieldName: 'content',
  embeddingFieldName: 'embedding',
  metadataFields: [
    { name: 'genre', type: 'TAG' },
    { name: 'year', type: 'NUMERIC' }
  ],
  algorithm: 'HNSW',
  distanceMetric: 'COSINE'
}

interface SearchCall {
  index: string
  query: string
  options: RedisSearchOptions
}

class FakeRedisClient implements RedisVectorClient {
  indexes: string[] = []
  keys: string[] = []
  knnReply: RedisSearchReply = { total: 0, documents: [] }
  failWith: Error | null = null
  numDocs = '0'

  readonly created: Array<{
    index: string
    schema: RediSearchSchema
    options: { ON: 'JSON'; PREFIX: string }
  }> = []
  readonly searches: SearchCall[] = []
  readonly deletes: string[][] = []
  readonly jsonSets: Array<[string, string, RedisJsonDocument]> = []
  pipelines = 0
  execs = 0

  readonly ft = {
    _list: async (): Promise<string[]> => {
      this.throwIfFailing()
      return this.indexes
    },
    create: async (
      index: string,
      schema: RediSearchSchema,
      createOptions: { ON: 'JSON'; PREFIX: string }
    ): Promise<string> => {
      this.throwIfFailing()
      this.created.push({ index, schema, options: createOptions })
      this.indexes.push(index)
      return 'OK'
    },
    search: async (
      index: string,
      query: string,
      searchOptions: RedisSearchOptions
    ): Promise<RedisSearchReply> => {
      this.throwIfFailing()
      this.searches.push({ index, query, options: searchOptions })
      if (query.includes('=>[KNN')) {
        return this.knnReply
      }
      const size = searchOptions.LIMIT?.size ?? 10
      const page = this.keys.slice(0, size)
      return {
        total: this.keys.length,
        documents: page.map((id) => ({ id, value: {} }))
      }
    },
    info: async (): Promise<{ numDocs: string }> => {
      this.throwIfFailing()
      return { numDocs: this.numDocs }
    }
  }

  multi(): RedisJsonPipeline {
    this.pipelines++
    const pipeline: RedisJsonPipeline = {
      json: {
        set: (key, path, json) => {
          this.jsonSets.push([key, path, json])
          return pipeline
        }
      },
      exec: async () => {
        this.execs++
        return this.jsonSets.map(() => 'OK')
      }
    }
    return pipeline
  }

  async del(keys: string[]): Promise<number> {
    this.throwIfFailing()
    this.deletes.push(keys)
    const before = this.keys.length
    this.keys = this.keys.filter((key) => !keys.includes(key))
    return before - this.keys.length
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith
    }
  }
}

const keyRange = (count: number) =>
  Array.from({ length: count }, (_, index) => `embedding:doc-${index}`)

describe('RedisVectorRepository', () => {
  let client: FakeRedisClient
  let repository: RedisVectorRepository

  beforeEach(() => {
    client = new FakeRedisClient()
    repository = new RedisVectorRepository(client, options)
  })

  it('looks the index up in the index list', async () => {
    client.indexes = ['other-index']
    expect(await repository.indexExists()).toBe(false)

    client.indexes = ['other-index', 'docs-index']
    expect(await repository.indexExists()).toBe(true)
  })

  it('creates a JSON index over the key prefix', async () => {
    await repository.createIndex(3)

    expect(client.created).toEqual([
      {
        index: 'docs-index',
        schema: buildIndexSchema(options, 3),
        options: { ON: 'JSON', PREFIX: 'embedding:' }
      }
    ])
  })

  it('writes every record with JSON.SET in one pipeline', async () => {
    await repository.upsert([
      { id: 'a', values: [1, 2], content: 'first', metadata: { genre: 'pets' } },
      { id: 'b', values: [3, 4], content: 'second', metadata: { year: 2020 } }
    ])

    expect(client.pipelines).toBe(1)
    expect(client.execs).toBe(1)
    expect(client.jsonSets).toEqual([
      ['embedding:a', '$', { genre: 'pets', content: 'first', embedding: [1, 2] }],
      ['embedding:b', '$', { year: 2020, content: 'second', embedding: [3, 4] }]
    ])
  })

  it('skips the pipeline when there is nothing to write', async () => {
    await repository.upsert([])

    expect(client.pipelines).toBe(0)
  })

  it('runs a KNN query sorted by distance', async () => {
    client.knnReply = {
      total: 1,
      documents: [
        {
          id: 'embedding:a',
          value: { content: 'first', genre: 'pets', year: '2021', vector_score: '0.25' }
        }
      ]
    }

    const results = await repository.search({
      vector: [1, 0],
      topK: 2,
      filter: '@genre:{pets}'
    })

    expect(client.searches).toEqual([
      {
        index: 'docs-index',
        query: '(@genre:{pets})=>[KNN 2 @embedding $BLOB AS vector_score]',
        options: {
          PARAMS: { BLOB: toFloat32Buffer([1, 0]) },
          RETURN: ['content', 'genre', 'year', 'vector_score'],
          SORTBY: { BY: 'vector_score', DIRECTION: 'ASC' },
          LIMIT: { from: 0, size: 2 },
          DIALECT: 2
        }
      }
    ])
    expect(results).toEqual([
      {
        id: 'a',
        content: 'first',
        metadata: { genre: 'pets', year: 2021 },
        distance: 0.25,
        score: 0.75
      }
    ])
  })

  it('deletes prefixed keys by id', async () => {
    client.keys = ['embedding:a', 'embedding:b']

    expect(await repository.deleteByIds(['a', 'missing'])).toBe(1)
    expect(client.deletes).toEqual([['embedding:a', 'embedding:missing']])
    expect(await repository.deleteByIds([])).toBe(0)
    expect(client.deletes).toHaveLength(1)
  })

  describe('deleteByFilter', () => {
    it('pages through matches until a short page', async () => {
      client.keys = keyRange(DELETE_BY_FILTER_PAGE_SIZE + 500)

      expect(await repository.deleteByFilter('@genre:{pets}')).toBe(1500)
      expect(client.searches).toHaveLength(2)
      expect(client.deletes.map((keys) => keys.length)).toEqual([1000, 500])
      expect(client.searches[0]).toEqual({
        index: 'docs-index',
        query: '@genre:{pets}',
        options: { RETURN: [], LIMIT: { from: 0, size: 1000 }, DIALECT: 2 }
      })
      expect(client.keys).toEqual([])
    })

    it('stops on an empty page after a full one', async () => {
      client.keys = keyRange(DELETE_BY_FILTER_PAGE_SIZE)

      expect(await repository.deleteByFilter('@genre:{pets}')).toBe(1000)
      expect(client.searches).toHaveLength(2)
      expect(client.deletes).toHaveLength(1)
    })

    it('deletes nothing when nothing matches', async () => {
      expect(await repository.deleteByFilter('@genre:{pets}')).toBe(0)
      expect(client.searches).toHaveLength(1)
      expect(client.deletes).toEqual([])
    })
  })

  it('reports the document count from FT.INFO', async () => {
    client.numDocs = '7'

    expect(await repository.getStats()).toEqual({ totalVectors: 7 })
  })

  it('wraps client failures in an IntegrationError', async () => {
    client.failWith = new Error('connection lost')

    const failure = repository.indexExists()

    await expect(failure).rejects.toBeInstanceOf(IntegrationError)
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to list indexes for Redis index docs-index',
      context: {
        service: 'redis',
        indexName: 'docs-index',
        originalError: 'connection lost'
      }
    })
  })
})
