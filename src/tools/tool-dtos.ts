/**
 * DTOs for tool definitions used in Ollama function calling
 */

export type JsonSchema = Record<string, unknown>

export interface ToolFunctionSpec {
  name: string
  description: string
  parameters: JsonSchema
}

export interface ToolDefinition {
  type: 'function'
  function: ToolFunctionSpec
}

export interface ToolCallRequest {
  name: string
  /** JSON text or an already decoded object. */
  arguments: unknown
}

export interface ToolCallResult {
  name: string
  input: unknown
  result: string
}
