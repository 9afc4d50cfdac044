import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'
import { ToolCallResult } from '@/tools/tool-dtos.js'
import { AIProvider, ToolExecutor } from './ai-provider.js'
import {
  FunctionCallingRequest,
  FunctionCallingResult
} from './ai-provider-dtos.js'
import {
  OllamaChatRequest,
  OllamaChatResponse,
  OllamaEmbedRequest,
  OllamaMessage,
  ollamaChatResponseSchema,
  ollamaEmbedResponseSchema,
  ollamaErrorResponseSchema
} from './ollama-dtos.js'

const logger = getLogger()

export interface OllamaProviderOptions {
  baseUrl: string
  chatModel: string
  embeddingModel: string
  temperature?: number
  maxToolIterations?: number
}

export class OllamaProvider implements AIProvider {
  private readonly baseUrl: string

  constructor(private readonly options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
  }

  private async makeRequest<T>(
    endpoint: string,
    body: OllamaChatRequest | OllamaEmbedRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body)
      })

      if (!response.ok) {
        const message =
          ollamaErrorMessage(await response.text()) ??
          (response.statusText || 'Ollama request failed')
        logger.error(`Error calling Ollama endpoint ${endpoint}`, {
          status: response.status,
          errorMessage: message,
          model: body.model
        })
        throw new IntegrationError(message, {
          service: 'ollama',
          details: `status=${response.status}, endpoint=${endpoint}`
        })
      }

      const data: unknown = await response.json()
      const parsed = schema.safeParse(data)
      if (!parsed.success) {
        throw new IntegrationError('Invalid response format from Ollama', {
          service: 'ollama',
          details: parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')
        })
      }
      return parsed.data
    } catch (error) {
      if (error instanceof IntegrationError) {
        throw error
      }
      logger.error(`Unexpected error in Ollama provider for endpoint ${endpoint}`, {
        error
      })
      const errorMessage = error instanceof Error ? error.message : 'Unknown error'
      throw new IntegrationError('Unexpected error calling Ollama', {
        service: 'ollama',
        details: errorMessage
      })
    }
  }

  private async chat(
    messages: OllamaMessage[],
    settings: Omit<FunctionCallingRequest, 'prompt' | 'systemPrompt'>
  ): Promise<OllamaChatResponse> {
    const model = settings.model ?? this.options.chatModel
    const temperature = settings.temperature ?? this.options.temperature

    return this.makeRequest(
      '/api/chat',
      {
        model,
        messages,
        ...(settings.tools.length > 0 ? { tools: settings.tools } : {}),
        stream: false,
        options: {
          temperature,
          num_predict: settings.maxTokens
        }
      },
      ollamaChatResponseSchema
    )
  }

  async generateResponse(prompt: string): Promise<string> {
    logger.info('Invoking Ollama model', {
      model: this.options.chatModel,
      promptLength: prompt.length
    })

    const response = await this.chat([{ role: 'user', content: prompt }], {
      tools: []
    })
    return response.message.content.trim()
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text])
    return embedding
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return []
    }

    logger.info('Generating Ollama embeddings', {
      model: this.options.embeddingModel,
      textCount: texts.length
    })

    const { embeddings } = await this.makeRequest(
      '/api/embed',
      { model: this.options.embeddingModel, input: texts },
      ollamaEmbedResponseSchema
    )

    if (embeddings.length !== texts.length) {
      throw new IntegrationError('Unexpected number of embeddings from Ollama', {
        service: 'ollama',
        details: `expected=${texts.length}, received=${embeddings.length}`
      })
    }
    return embeddings
  }

  async executeWithFunctionCalling(
    request: FunctionCallingRequest,
    toolExecutor: ToolExecutor
  ): Promise<FunctionCallingResult> {
    logger.info('Starting function calling execution', {
      promptPreview: request.prompt.substring(0, 100),
      toolsCount: request.tools.length
    })

    const toolCalls: ToolCallResult[] = []
    const messages: OllamaMessage[] = [
      ...(request.systemPrompt
        ? [{ role: 'system' as const, content: request.systemPrompt }]
        : []),
      { role: 'user', content: request.prompt }
    ]

    const maxIterations =
      request.maxIterations ?? this.options.maxToolIterations ?? 10

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      logger.info(`Function calling iteration ${iteration}`)

      const { message } = await this.chat(messages, request)
      const requestedCalls = message.tool_calls ?? []

      if (requestedCalls.length === 0) {
        logger.info('Function calling completed', {
          iterations: iteration,
          toolCallsCount: toolCalls.length
        })
        return {
          response: message.content,
          toolCalls,
          iterations: iteration
        }
      }

      messages.push({
        role: 'assistant',
        content: message.content,
        tool_calls: requestedCalls
      })

      // Every call of the turn is answered before the model is asked again.
      for (const call of requestedCalls) {
        const { name, arguments: input } = call.function
        logger.info('Executing tool', { toolName: name })

        try {
          const result = await toolExecutor.executeTool(name, input)
          toolCalls.push({ name, input, result })
          messages.push({ role: 'tool', content: result, tool_name: name })
          logger.info('Tool executed successfully', { toolName: name })
        } catch (error) {
          logger.error('Tool execution failed', { toolName: name, error })
          throw error
        }
      }
    }

    throw new IntegrationError(`Maximum iterations (${maxIterations}) reached`, {
      service: 'ollama',
      details: 'Function calling exceeded iteration limit'
    })
  }
}

function ollamaErrorMessage(body: string): string | undefined {
  try {
    const parsed = ollamaErrorResponseSchema.safeParse(JSON.parse(body))
    return parsed.success ? parsed.data.error : undefined
  } catch (error) {
    logger.debug('Ollama error body is not JSON', { error })
    return undefined
  }
}
