export * from './shared/errors/integration-error.js'
export * from './shared/errors/validation-error.js'
export * from './shared/errors/function-call-errors.js'
export * from './shared/errors/vector-store-errors.js'
export { loadConfig } from './shared/config/env.js'
export type { AppConfig } from './shared/config/env.js'
export { getLogger } from './shared/logger/get-logger.js'
export { redis, closeRedis } from './shared/clients/redis-client.js'

export * from './providers/ai/ai-provider.js'
export * from './providers/ai/ai-provider-dtos.js'
export { OllamaProvider } from './providers/ai/ollama-provider.js'
export type { OllamaProviderOptions } from './providers/ai/ollama-provider.js'

export * from './tools/tool-dtos.js'
export * from './tools/function-callback.js'
export * from './tools/function-callback-registry.js'
export * from './tools/weather/current-weather-function.js'

export * from './vector-store/vector-store-dtos.js'
export * from './vector-store/filters/filter-expression.js'
export { parseFilterExpression } from './vector-store/filters/filter-expression-parser.js'
export * from './vector-store/filters/redis-filter-converter.js'
export * from './vector-store/batching/batching-strategy.js'
export * from './vector-store/batching/fixed-size-batching-strategy.js'
export * from './vector-store/batching/token-count-batching-strategy.js'
export * from './vector-store/batching/token-counter.js'
export * from './vector-store/redis-vector-store.js'
export * from './repositories/vector-repository.js'
export * from './repositories/types/vector-repository-dto.js'
export { RedisVectorRepository } from './repositories/redis/redis-vector-repository.js'
export type { RedisIndexOptions } from './repositories/redis/redis-query-builder.js'

export * from './use-cases/chat-with-functions.js'
export * from './use-cases/ingest-documents.js'
export * from './use-cases/search-documents.js'
export * from './use-cases/delete-documents.js'
export * from './use-cases/factories/make-chat-with-functions.js'
export * from './use-cases/factories/make-redis-vector-store.js'

export * from './handlers/handler-response.js'
export { chatWithFunctionsHandler } from './handlers/chat-with-functions.js'
export { ingestDocumentsHandler } from './handlers/ingest-documents.js'
export { searchDocumentsHandler } from './handlers/search-documents.js'
export { deleteDocumentsHandler } from './handlers/delete-documents.js'
