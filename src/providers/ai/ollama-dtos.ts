import { z } from 'zod'
import { ToolDefinition } from '@/tools/tool-dtos.js'

export const ollamaToolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.union([z.record(z.unknown()), z.string()]).default({})
  })
})

export type OllamaToolCall = z.infer<typeof ollamaToolCallSchema>

export const ollamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string().default(''),
    tool_calls: z.array(ollamaToolCallSchema).optional()
  }),
  done: z.boolean().optional()
})

export type OllamaChatResponse = z.infer<typeof ollamaChatResponseSchema>

export const ollamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number()))
})

export type OllamaEmbedResponse = z.infer<typeof ollamaEmbedResponseSchema>

export const ollamaErrorResponseSchema = z.object({
  error: z.string()
})

export interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool'
  content: string
  tool_calls?: OllamaToolCall[]
  /** Name of the function whose result a `tool` message carries. */
  tool_name?: string
}

export interface OllamaChatRequest {
  model: string
  messages: OllamaMessage[]
  tools?: ToolDefinition[]
  stream: false
  options?: {
    temperature?: number
    num_predict?: number
  }
}

export interface OllamaEmbedRequest {
  model: string
  input: string[]
}
