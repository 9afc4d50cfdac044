import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { makeDeleteDocuments } from '@/use-cases/factories/make-delete-documents.js'
import { DeleteDocumentsResponse } from '@/use-cases/delete-documents.js'
import { HandlerResponse, failure, ok } from './handler-response.js'

const logger = getLogger()

const schema = z
  .object({
    ids: z.array(z.string().min(1)).min(1).optional(),
    filterExpression: z.string().min(1).optional()
  })
  .refine(
    (event) => (event.ids === undefined) !== (event.filterExpression === undefined),
    { message: 'Provide either ids or filterExpression' }
  )

export const deleteDocumentsHandler = async (
  event: unknown
): Promise<HandlerResponse<DeleteDocumentsResponse>> => {
  try {
    const request = schema.parse(event)

    logger.info('Document deletion triggered', {
      idCount: request.ids?.length,
      filterExpression: request.filterExpression
    })

    const useCase = await makeDeleteDocuments()
    const result = await useCase.execute(request)

    return ok(result, `Deleted ${result.deleted} documents`)
  } catch (error) {
    logger.error('Error in delete documents handler', { error })
    return failure(error, 'Failed to delete documents')
  }
}
