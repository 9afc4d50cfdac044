import { RediSearchSchema, SchemaFieldTypes, VectorAlgorithms } from 'redis'
import { DistanceMetric, VectorAlgorithm } from '@/shared/config/env.js'
import {
  Metadata,
  MetadataField
} from '@/vector-store/vector-store-dtos.js'
import {
  SearchResult,
  VectorRecord
} from '../types/vector-repository-dto.js'

export const SCORE_FIELD = 'vector_score'
const QUERY_VECTOR_PARAM = 'BLOB'

export interface RedisIndexOptions {
  indexName: string
  prefix: string
  contentFieldName: string
  embeddingFieldName: string
  metadataFields: MetadataField[]
  algorithm: VectorAlgorithm
  distanceMetric: DistanceMetric
}

export type RedisJsonDocument = Record<string, string | number | boolean | number[]>

export function buildIndexSchema(
  options: RedisIndexOptions,
  dimensions: number
): RediSearchSchema {
  const { contentFieldName, embeddingFieldName, distanceMetric } = options

  const schema: RediSearchSchema = {
    [`$.${contentFieldName}`]: {
      type: SchemaFieldTypes.TEXT,
      AS: contentFieldName
    },
    [`$.${embeddingFieldName}`]:
      options.algorithm === 'FLAT'
        ? {
            type: SchemaFieldTypes.VECTOR,
            ALGORITHM: VectorAlgorithms.FLAT,
            TYPE: 'FLOAT32',
            DIM: dimensions,
            DISTANCE_METRIC: distanceMetric,
            AS: embeddingFieldName
          }
        : {
            type: SchemaFieldTypes.VECTOR,
            ALGORITHM: VectorAlgorithms.HNSW,
            TYPE: 'FLOAT32',
            DIM: dimensions,
            DISTANCE_METRIC: distanceMetric,
            AS: embeddingFieldName
          }
  }

  for (const field of options.metadataFields) {
    const path = `$.${field.name}`
    switch (field.type) {
      case 'TAG':
        schema[path] = { type: SchemaFieldTypes.TAG, AS: field.name }
        break
      case 'TEXT':
        schema[path] = { type: SchemaFieldTypes.TEXT, AS: field.name }
        break
      case 'NUMERIC':
        schema[path] = { type: SchemaFieldTypes.NUMERIC, AS: field.name }
        break
    }
  }

  return schema
}

export function buildKnnQuery(
  filter: string | undefined,
  topK: number,
  embeddingFieldName: string
): string {
  const preFilter = filter ? `(${filter})` : '*'
  return `${preFilter}=>[KNN ${topK} @${embeddingFieldName} $${QUERY_VECTOR_PARAM} AS ${SCORE_FIELD}]`
}

export function queryParams(vector: number[]): Record<string, Buffer> {
  return { [QUERY_VECTOR_PARAM]: toFloat32Buffer(vector) }
}

export function toFloat32Buffer(values: number[]): Buffer {
  return Buffer.from(new Float32Array(values).buffer)
}

export function returnFields(options: RedisIndexOptions): string[] {
  return [
    options.contentFieldName,
    ...options.metadataFields.map((field) => field.name),
    SCORE_FIELD
  ]
}

export function toJsonDocument(
  record: VectorRecord,
  options: RedisIndexOptions
): RedisJsonDocument {
  return {
    ...record.metadata,
    [options.contentFieldName]: record.content,
    [options.embeddingFieldName]: record.values
  }
}

export function keyFor(id: string, prefix: string): string {
  return `${prefix}${id}`
}

export function idFromKey(key: string, prefix: string): string {
  return key.startsWith(prefix) ? key.slice(prefix.length) : key
}

export function distanceToScore(distance: number, metric: DistanceMetric): number {
  switch (metric) {
    case 'COSINE':
    case 'IP':
      return 1 - distance
    case 'L2':
      return 1 / (1 + distance)
  }
}

export function parseSearchDocument(
  document: { id: string; value: Record<string, unknown> },
  options: RedisIndexOptions
): SearchResult {
  const { value } = document
  const distance = Number(value[SCORE_FIELD])

  const metadata: Metadata = {}
  for (const field of options.metadataFields) {
    const raw = value[field.name]
    if (raw === undefined || raw === null) continue
    metadata[field.name] = field.type === 'NUMERIC' ? Number(raw) : String(raw)
  }

  const content = value[options.contentFieldName]
  return {
    id: idFromKey(document.id, options.prefix),
    content: typeof content === 'string' ? content : '',
    metadata,
    distance,
    score: distanceToScore(distance, options.distanceMetric)
  }
}
