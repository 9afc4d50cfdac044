import { Document } from '../vector-store-dtos.js'

export interface BatchingStrategy {
  /** Splits documents into embedding batches, keeping their order. */
  batch<T extends Document>(documents: T[]): T[][]
}
