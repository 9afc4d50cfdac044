import { FilterExpression } from './filters/filter-expression.js'

export const METADATA_FIELD_TYPES = ['TAG', 'TEXT', 'NUMERIC'] as const

export type MetadataFieldType = (typeof METADATA_FIELD_TYPES)[number]

/** A metadata key that is indexed and may be referenced by filters. */
export interface MetadataField {
  name: string
  type: MetadataFieldType
}

export type MetadataValue = string | number | boolean

export type Metadata = Record<string, MetadataValue>

export interface Document {
  /** Generated when absent. */
  id?: string
  content: string
  metadata?: Metadata
}

export interface SimilaritySearchRequest {
  query: string
  topK?: number
  /** Minimum similarity score in [0, 1]; 0 accepts every match. */
  similarityThreshold?: number
  filterExpression?: string | FilterExpression
}

export interface SimilaritySearchResult {
  id: string
  content: string
  metadata: Metadata
  score: number
  distance: number
}
