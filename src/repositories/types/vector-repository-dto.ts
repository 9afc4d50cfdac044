import { Metadata } from '@/vector-store/vector-store-dtos.js'

export interface VectorRecord {
  id: string
  values: number[]
  content: string
  metadata: Metadata
}

export interface SearchQuery {
  vector: number[]
  topK: number
  /** Native pre-filter; every record is a candidate when absent. */
  filter?: string
}

export interface SearchResult {
  id: string
  content: string
  metadata: Metadata
  /** Raw distance reported by the index. */
  distance: number
  /** Similarity derived from the distance; higher is closer. */
  score: number
}
