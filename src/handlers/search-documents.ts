import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { makeSearchDocuments } from '@/use-cases/factories/make-search-documents.js'
import { SearchDocumentsResponse } from '@/use-cases/search-documents.js'
import { HandlerResponse, failure, ok } from './handler-response.js'

const logger = getLogger()

const schema = z.object({
  query: z.string().min(1),
  topK: z.number().int().min(1).optional(),
  similarityThreshold: z.number().min(0).max(1).optional(),
  filterExpression: z.string().min(1).optional()
})

export const searchDocumentsHandler = async (
  event: unknown
): Promise<HandlerResponse<SearchDocumentsResponse>> => {
  try {
    const request = schema.parse(event)

    logger.info('Document search triggered', { request })

    const useCase = await makeSearchDocuments()
    const result = await useCase.execute(request)

    return ok(result, `Found ${result.results.length} documents`)
  } catch (error) {
    logger.error('Error in search documents handler', { error })
    return failure(error, 'Failed to search documents')
  }
}
