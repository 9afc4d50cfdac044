import { AppConfig, loadConfig } from '@/shared/config/env.js'
import { IngestDocumentsUseCase } from '../ingest-documents.js'
import { makeRedisVectorStore } from './make-redis-vector-store.js'

export async function makeIngestDocuments(config: AppConfig = loadConfig()) {
  const vectorStore = await makeRedisVectorStore(config)
  return new IngestDocumentsUseCase(vectorStore)
}
