import {
  VectorRecord,
  SearchQuery,
  SearchResult
} from './types/vector-repository-dto.js'

export interface VectorRepository {
  readonly indexName: string
  indexExists(): Promise<boolean>
  createIndex(dimensions: number): Promise<void>
  upsert(vectors: VectorRecord[]): Promise<void>
  search(query: SearchQuery): Promise<SearchResult[]>
  deleteByIds(ids: string[]): Promise<number>
  deleteByFilter(filter: string): Promise<number>
  getStats(): Promise<{ totalVectors: number }>
}
