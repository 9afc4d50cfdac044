import { DocumentTooLargeError } from '@/shared/errors/vector-store-errors.js'
import { ValidationError } from '@/shared/errors/validation-error.js'
import { Document } from '../vector-store-dtos.js'
import { BatchingStrategy } from './batching-strategy.js'
import { TiktokenCounter, TokenCounter } from './token-counter.js'

export interface TokenCountBatchingOptions {
  maxInputTokenCount?: number
  /** Share of the budget kept free, in [0, 1). */
  reservePercentage?: number
  tokenCounter?: TokenCounter
}

/**
 * Packs documents into batches whose summed token count stays within the
 * embedding model's input budget.
 */
export class TokenCountBatchingStrategy implements BatchingStrategy {
  private readonly maxTokens: number
  private readonly tokenCounter: TokenCounter

  constructor({
    maxInputTokenCount = 8191,
    reservePercentage = 0.1,
    tokenCounter = new TiktokenCounter()
  }: TokenCountBatchingOptions = {}) {
    if (!Number.isInteger(maxInputTokenCount) || maxInputTokenCount < 1) {
      throw new ValidationError('maxInputTokenCount must be a positive integer')
    }
    if (reservePercentage < 0 || reservePercentage >= 1) {
      throw new ValidationError('reservePercentage must be in [0, 1)')
    }
    this.maxTokens = Math.floor(maxInputTokenCount * (1 - reservePercentage))
    this.tokenCounter = tokenCounter
  }

  batch<T extends Document>(documents: T[]): T[][] {
    const batches: T[][] = []
    let current: T[] = []
    let currentTokens = 0

    for (const document of documents) {
      const tokens = this.tokenCounter.count(document.content)
      if (tokens > this.maxTokens) {
        throw new DocumentTooLargeError(tokens, this.maxTokens)
      }
      if (currentTokens + tokens > this.maxTokens) {
        batches.push(current)
        current = []
        currentTokens = 0
      }
      current.push(document)
      currentTokens += tokens
    }

    if (current.length > 0) {
      batches.push(current)
    }
    return batches
  }
}
