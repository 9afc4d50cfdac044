import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { makeChatWithFunctions } from '@/use-cases/factories/make-chat-with-functions.js'
import { ChatWithFunctionsResponse } from '@/use-cases/chat-with-functions.js'
import { HandlerResponse, failure, ok } from './handler-response.js'

const logger = getLogger()

const schema = z.object({
  prompt: z.string().min(1),
  functions: z.array(z.string().min(1)).optional(),
  systemPrompt: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).optional()
})

export const chatWithFunctionsHandler = async (
  event: unknown
): Promise<HandlerResponse<ChatWithFunctionsResponse>> => {
  try {
    const request = schema.parse(event)

    logger.info('Chat with functions triggered', {
      promptLength: request.prompt.length,
      functions: request.functions
    })

    const useCase = makeChatWithFunctions()
    const result = await useCase.execute(request)

    return ok(result, 'Chat completed successfully')
  } catch (error) {
    logger.error('Error in chat with functions handler', { error })
    return failure(error, 'Failed to complete chat')
  }
}
