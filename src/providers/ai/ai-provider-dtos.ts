import { ToolCallResult, ToolDefinition } from '@/tools/tool-dtos.js'

export interface FunctionCallingRequest {
  prompt: string
  systemPrompt?: string
  tools: ToolDefinition[]
  model?: string
  maxTokens?: number
  temperature?: number
  maxIterations?: number
}

export interface FunctionCallingResult {
  response: string
  toolCalls: ToolCallResult[]
  iterations: number
}
