import { VectorRepository } from '@/repositories/vector-repository.js'
import {
  SearchQuery,
  SearchResult,
  VectorRecord
} from '@/repositories/types/vector-repository-dto.js'

export class InMemoryVectorRepository implements VectorRepository {
  readonly records = new Map<string, VectorRecord>()
  readonly searches: SearchQuery[] = []
  readonly deletedFilters: string[] = []
  createdDimensions: number | null = null
  createIndexCalls = 0
  upsertBatches = 0

  constructor(
    readonly indexName = 'test-index',
    private exists = false
  ) {}

  async indexExists(): Promise<boolean> {
    return this.exists
  }

  async createIndex(dimensions: number): Promise<void> {
    this.createIndexCalls++
    if (this.exists) {
      throw new Error('Index already exists')
    }
    this.createdDimensions = dimensions
    this.exists = true
  }

  async upsert(vectors: VectorRecord[]): Promise<void> {
    this.upsertBatches++
    for (const vector of vectors) {
      this.records.set(vector.id, vector)
    }
  }

  async search(query: SearchQuery): Promise<SearchResult[]> {
    this.searches.push(query)
    return [...this.records.values()]
      .map((record) => {
        const distance = 1 - cosineSimilarity(query.vector, record.values)
        return {
          id: record.id,
          content: record.content,
          metadata: record.metadata,
          distance,
          score: 1 - distance
        }
      })
      .sort((a, b) => a.distance - b.distance)
      .slice(0, query.topK)
  }

  async deleteByIds(ids: string[]): Promise<number> {
    return ids.filter((id) => this.records.delete(id)).length
  }

  async deleteByFilter(filter: string): Promise<number> {
    this.deletedFilters.push(filter)
    return 0
  }

  async getStats(): Promise<{ totalVectors: number }> {
    return { totalVectors: this.records.size }
  }
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}
