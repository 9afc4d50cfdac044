import { RedisVectorStore } from '@/vector-store/redis-vector-store.js'
import { Document } from '@/vector-store/vector-store-dtos.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

export interface IngestDocumentsRequest {
  documents: Document[]
}

export interface IngestDocumentsResponse {
  ids: string[]
}

export class IngestDocumentsUseCase {
  constructor(private readonly vectorStore: RedisVectorStore) {}

  async execute({
    documents
  }: IngestDocumentsRequest): Promise<IngestDocumentsResponse> {
    logger.info('Ingesting documents', { documentCount: documents.length })

    const ids = await this.vectorStore.add(documents)

    logger.info('Documents ingested', { storedCount: ids.length })
    return { ids }
  }
}
