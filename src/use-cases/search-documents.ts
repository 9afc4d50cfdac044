import { RedisVectorStore } from '@/vector-store/redis-vector-store.js'
import {
  SimilaritySearchRequest,
  SimilaritySearchResult
} from '@/vector-store/vector-store-dtos.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

export interface SearchDocumentsResponse {
  results: SimilaritySearchResult[]
}

export class SearchDocumentsUseCase {
  constructor(private readonly vectorStore: RedisVectorStore) {}

  async execute(
    request: SimilaritySearchRequest
  ): Promise<SearchDocumentsResponse> {
    logger.info('Searching documents', {
      queryPreview: request.query.substring(0, 100),
      topK: request.topK,
      similarityThreshold: request.similarityThreshold,
      filterExpression: request.filterExpression
    })

    const results = await this.vectorStore.similaritySearch(request)
    return { results }
  }
}
