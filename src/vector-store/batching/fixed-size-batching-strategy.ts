import { ValidationError } from '@/shared/errors/validation-error.js'
import { Document } from '../vector-store-dtos.js'
import { BatchingStrategy } from './batching-strategy.js'

export class FixedSizeBatchingStrategy implements BatchingStrategy {
  constructor(private readonly batchSize: number = 10) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError('batchSize must be a positive integer')
    }
  }

  batch<T extends Document>(documents: T[]): T[][] {
    const batches: T[][] = []
    for (let i = 0; i < documents.length; i += this.batchSize) {
      batches.push(documents.slice(i, i + this.batchSize))
    }
    return batches
  }
}
