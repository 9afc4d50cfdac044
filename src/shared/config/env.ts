import { z } from 'zod'
import { ConfigurationError } from '../errors/validation-error.js'
import {
  METADATA_FIELD_TYPES,
  MetadataField
} from '@/vector-store/vector-store-dtos.js'

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true')

const metadataFieldsSchema = z
  .string()
  .default('')
  .transform((value, ctx): MetadataField[] => {
    const fields: MetadataField[] = []
    for (const entry of value.split(',')) {
      const trimmed = entry.trim()
      if (!trimmed) continue

      const [name, type] = trimmed.split(':').map((part) => part.trim())
      const fieldType = METADATA_FIELD_TYPES.find(
        (candidate) => candidate === type?.toUpperCase()
      )
      if (!name || !fieldType) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${trimmed}" must look like name:${METADATA_FIELD_TYPES.join('|')}`
        })
        continue
      }
      fields.push({ name, type: fieldType })
    }
    return fields
  })

const envSchema = z.object({
  SERVICE_NAME: z.string().min(1).default('ai-adapters'),
  LOG_LEVEL: z
    .enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT', 'CRITICAL'])
    .default('INFO'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_CHAT_MODEL: z.string().min(1).default('llama3.1'),
  OLLAMA_EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
  OLLAMA_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.8),
  OLLAMA_MAX_TOOL_ITERATIONS: z.coerce.number().int().min(1).default(10),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  VECTOR_STORE_INDEX: z.string().min(1).default('default-index'),
  VECTOR_STORE_PREFIX: z.string().min(1).default('embedding:'),
  VECTOR_STORE_INITIALIZE_SCHEMA: booleanFlag,
  VECTOR_STORE_METADATA_FIELDS: metadataFieldsSchema,
  VECTOR_STORE_DIMENSIONS: z.coerce.number().int().min(1).optional(),
  VECTOR_STORE_ALGORITHM: z.enum(['HNSW', 'FLAT']).default('HNSW'),
  VECTOR_STORE_DISTANCE_METRIC: z.enum(['COSINE', 'L2', 'IP']).default('COSINE'),
  VECTOR_STORE_BATCHING_STRATEGY: z
    .enum(['TOKEN_COUNT', 'FIXED_SIZE'])
    .default('TOKEN_COUNT'),
  VECTOR_STORE_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
  VECTOR_STORE_MAX_INPUT_TOKENS: z.coerce.number().int().min(1).default(8191)
})

type Env = z.infer<typeof envSchema>

export type LogLevel = Env['LOG_LEVEL']
export type VectorAlgorithm = Env['VECTOR_STORE_ALGORITHM']
export type DistanceMetric = Env['VECTOR_STORE_DISTANCE_METRIC']
export type BatchingStrategyName = Env['VECTOR_STORE_BATCHING_STRATEGY']

export interface AppConfig {
  serviceName: string
  logLevel: LogLevel
  ollama: {
    baseUrl: string
    chatModel: string
    embeddingModel: string
    temperature: number
    maxToolIterations: number
  }
  redisUrl: string
  vectorStore: {
    indexName: string
    prefix: string
    initializeSchema: boolean
    metadataFields: MetadataField[]
    dimensions?: number
    algorithm: VectorAlgorithm
    distanceMetric: DistanceMetric
    batchingStrategy: BatchingStrategyName
    batchSize: number
    maxInputTokenCount: number
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so that `KEY=` falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )

  const result = envSchema.safeParse(present)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const parsed = result.data
  return {
    serviceName: parsed.SERVICE_NAME,
    logLevel: parsed.LOG_LEVEL,
    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ''),
      chatModel: parsed.OLLAMA_CHAT_MODEL,
      embeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
      temperature: parsed.OLLAMA_TEMPERATURE,
      maxToolIterations: parsed.OLLAMA_MAX_TOOL_ITERATIONS
    },
    redisUrl: parsed.REDIS_URL,
    vectorStore: {
      indexName: parsed.VECTOR_STORE_INDEX,
      prefix: parsed.VECTOR_STORE_PREFIX,
      initializeSchema: parsed.VECTOR_STORE_INITIALIZE_SCHEMA,
      metadataFields: parsed.VECTOR_STORE_METADATA_FIELDS,
      dimensions: parsed.VECTOR_STORE_DIMENSIONS,
      algorithm: parsed.VECTOR_STORE_ALGORITHM,
      distanceMetric: parsed.VECTOR_STORE_DISTANCE_METRIC,
      batchingStrategy: parsed.VECTOR_STORE_BATCHING_STRATEGY,
      batchSize: parsed.VECTOR_STORE_BATCH_SIZE,
      maxInputTokenCount: parsed.VECTOR_STORE_MAX_INPUT_TOKENS
    }
  }
}
