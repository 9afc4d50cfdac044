import { AppConfig, loadConfig } from '@/shared/config/env.js'
import { DeleteDocumentsUseCase } from '../delete-documents.js'
import { makeRedisVectorStore } from './make-redis-vector-store.js'

export async function makeDeleteDocuments(config: AppConfig = loadConfig()) {
  const vectorStore = await makeRedisVectorStore(config)
  return new DeleteDocumentsUseCase(vectorStore)
}
