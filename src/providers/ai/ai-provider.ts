import {
  FunctionCallingRequest,
  FunctionCallingResult
} from './ai-provider-dtos.js'

export interface ToolExecutor {
  /**
   * Runs the named function with the model-supplied arguments.
   * @returns The function result serialized as JSON.
   */
  executeTool(toolName: string, input: unknown): Promise<string>
}

export interface EmbeddingProvider {
  generateEmbedding(text: string): Promise<number[]>
  /** One vector per input text, in input order. */
  generateEmbeddings(texts: string[]): Promise<number[][]>
}

export interface AIProvider extends EmbeddingProvider {
  /**
   * Generates a response based on the provided prompt.
   * @param prompt The input text to generate a response for.
   */
  generateResponse(prompt: string): Promise<string>

  /**
   * Executes function calling with tools.
   * @param request The function calling request with prompt and tools.
   * @param toolExecutor The executor that handles tool invocations.
   */
  executeWithFunctionCalling(
    request: FunctionCallingRequest,
    toolExecutor: ToolExecutor
  ): Promise<FunctionCallingResult>
}
