import { RedisVectorStore } from '@/vector-store/redis-vector-store.js'
import { ValidationError } from '@/shared/errors/validation-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

/** Exactly one of `ids` or `filterExpression`. */
export interface DeleteDocumentsRequest {
  ids?: string[]
  filterExpression?: string
}

export interface DeleteDocumentsResponse {
  deleted: number
}

export class DeleteDocumentsUseCase {
  constructor(private readonly vectorStore: RedisVectorStore) {}

  async execute(
    request: DeleteDocumentsRequest
  ): Promise<DeleteDocumentsResponse> {
    const { ids, filterExpression } = request

    let deleted: number
    if (ids !== undefined && filterExpression === undefined) {
      deleted = await this.vectorStore.delete(ids)
    } else if (filterExpression !== undefined && ids === undefined) {
      deleted = await this.vectorStore.deleteByFilter(filterExpression)
    } else {
      throw new ValidationError('Provide either ids or filterExpression')
    }

    logger.info('Documents deleted', { deleted })
    return { deleted }
  }
}
