import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { makeIngestDocuments } from '@/use-cases/factories/make-ingest-documents.js'
import { IngestDocumentsResponse } from '@/use-cases/ingest-documents.js'
import { HandlerResponse, failure, ok } from './handler-response.js'

const logger = getLogger()

const schema = z.object({
  documents: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        content: z.string().min(1),
        metadata: z
          .record(z.union([z.string(), z.number(), z.boolean()]))
          .optional()
      })
    )
    .min(1)
})

export const ingestDocumentsHandler = async (
  event: unknown
): Promise<HandlerResponse<IngestDocumentsResponse>> => {
  try {
    const request = schema.parse(event)

    logger.info('Document ingestion triggered', {
      documentCount: request.documents.length
    })

    const useCase = await makeIngestDocuments()
    const result = await useCase.execute(request)

    return ok(result, `Stored ${result.ids.length} documents`)
  } catch (error) {
    logger.error('Error in ingest documents handler', { error })
    return failure(error, 'Failed to ingest documents')
  }
}
