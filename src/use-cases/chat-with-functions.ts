import { AIProvider } from '@/providers/ai/ai-provider.js'
import { FunctionCallbackRegistry } from '@/tools/function-callback-registry.js'
import { ToolCallResult } from '@/tools/tool-dtos.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

export interface ChatWithFunctionsRequest {
  prompt: string
  /** Names of the registered functions the model may call; all when omitted. */
  functions?: string[]
  systemPrompt?: string
  temperature?: number
  maxTokens?: number
}

export interface ChatWithFunctionsResponse {
  response: string
  toolCalls: ToolCallResult[]
  iterations: number
}

export class ChatWithFunctionsUseCase {
  constructor(
    private readonly aiProvider: AIProvider,
    private readonly registry: FunctionCallbackRegistry
  ) {}

  async execute(
    request: ChatWithFunctionsRequest
  ): Promise<ChatWithFunctionsResponse> {
    const executor = request.functions
      ? this.registry.scope(request.functions)
      : this.registry

    logger.info('Starting chat with functions', {
      promptLength: request.prompt.length,
      functions: executor.names()
    })

    const result = await this.aiProvider.executeWithFunctionCalling(
      {
        prompt: request.prompt,
        systemPrompt: request.systemPrompt,
        tools: executor.getToolDefinitions(),
        temperature: request.temperature,
        maxTokens: request.maxTokens
      },
      executor
    )

    logger.info('Chat with functions completed', {
      responseLength: result.response.length,
      toolCallsCount: result.toolCalls.length,
      iterations: result.iterations
    })

    return result
  }
}
