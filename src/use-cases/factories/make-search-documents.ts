import { AppConfig, loadConfig } from '@/shared/config/env.js'
import { SearchDocumentsUseCase } from '../search-documents.js'
import { makeRedisVectorStore } from './make-redis-vector-store.js'

export async function makeSearchDocuments(config: AppConfig = loadConfig()) {
  const vectorStore = await makeRedisVectorStore(config)
  return new SearchDocumentsUseCase(vectorStore)
}
