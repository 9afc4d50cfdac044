import { SchemaFieldTypes, VectorAlgorithms } from 'redis'
import {
  RedisIndexOptions,
  buildIndexSchema,
  buildKnnQuery,
  distanceToScore,
  idFromKey,
  keyFor,
  parseSearchDocument,
  queryParams,
  returnFields,
  toJsonDocument
} from '@/repositories/redis/redis-query-builder.js'

const options: RedisIndexOptions = {
  indexName: 'docs-index',
  prefix: 'embedding:',
  contentFieldName: 'content',
  embeddingFieldName: 'embedding',
  metadataFields: [
    { name: 'genre', type: 'TAG' },
    { name: 'year', type: 'NUMERIC' },
    { name: 'summary', type: 'TEXT' }
  ],
  algorithm: 'HNSW',
  distanceMetric: 'COSINE'
}

describe('redis query builder', () => {
  it('declares content, embedding and metadata fields on the JSON index', () => {
    expect(buildIndexSchema(options, 384)).toEqual({
      '$.content': { type: SchemaFieldTypes.TEXT, AS: 'content' },
      '$.embedding': {
        type: SchemaFieldTypes.VECTOR,
        ALGORITHM: VectorAlgorithms.HNSW,
        TYPE: 'FLOAT32',
        DIM: 384,
        DISTANCE_METRIC: 'COSINE',
        AS: 'embedding'
      },
      '$.genre': { type: SchemaFieldTypes.TAG, AS: 'genre' },
      '$.year': { type: SchemaFieldTypes.NUMERIC, AS: 'year' },
      '$.summary': { type: SchemaFieldTypes.TEXT, AS: 'summary' }
    })
  })

  it('uses the flat algorithm when configured', () => {
    const schema = buildIndexSchema(
      { ...options, algorithm: 'FLAT', distanceMetric: 'L2', metadataFields: [] },
      3
    )

    expect(schema['$.embedding']).toEqual({
      type: SchemaFieldTypes.VECTOR,
      ALGORITHM: VectorAlgorithms.FLAT,
      TYPE: 'FLOAT32',
      DIM: 3,
      DISTANCE_METRIC: 'L2',
      AS: 'embedding'
    })
  })

  it('builds KNN queries with and without a pre-filter', () => {
    expect(buildKnnQuery(undefined, 4, 'embedding')).toBe(
      '*=>[KNN 4 @embedding $BLOB AS vector_score]'
    )
    expect(buildKnnQuery('@genre:{pets} @year:[2020 inf]', 2, 'embedding')).toBe(
      '(@genre:{pets} @year:[2020 inf])=>[KNN 2 @embedding $BLOB AS vector_score]'
    )
  })

  it('passes the query vector as little-endian float32', () => {
    const { BLOB } = queryParams([0.5, -2])

    expect(BLOB).toHaveLength(8)
    expect(BLOB.readFloatLE(0)).toBe(0.5)
    expect(BLOB.readFloatLE(4)).toBe(-2)
  })

  it('returns the content, declared metadata and the score', () => {
    expect(returnFields(options)).toEqual([
      'content',
      'genre',
      'year',
      'summary',
      'vector_score'
    ])
  })

  it('stores metadata next to the content and the embedding', () => {
    expect(
      toJsonDocument(
        {
          id: 'a',
          values: [1, 2],
          content: 'hello',
          metadata: { genre: 'pets', year: 2021 }
        },
        options
      )
    ).toEqual({ genre: 'pets', year: 2021, content: 'hello', embedding: [1, 2] })
  })

  it('maps ids to keys and back', () => {
    expect(keyFor('a1', 'embedding:')).toBe('embedding:a1')
    expect(idFromKey('embedding:a1', 'embedding:')).toBe('a1')
    expect(idFromKey('other:a1', 'embedding:')).toBe('other:a1')
  })

  it('converts distances to similarity scores per metric', () => {
    expect(distanceToScore(0.25, 'COSINE')).toBe(0.75)
    expect(distanceToScore(0.25, 'IP')).toBe(0.75)
    expect(distanceToScore(1, 'L2')).toBe(0.5)
  })

  it('parses search replies into results', () => {
    expect(
      parseSearchDocument(
        {
          id: 'embedding:a1',
          value: {
            content: 'the cat',
            genre: 'pets',
            year: '2021',
            vector_score: '0.25'
          }
        },
        options
      )
    ).toEqual({
      id: 'a1',
      content: 'the cat',
      metadata: { genre: 'pets', year: 2021 },
      distance: 0.25,
      score: 0.75
    })
  })
})
