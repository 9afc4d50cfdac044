import { getEncoding, Tiktoken } from 'js-tiktoken'

export interface TokenCounter {
  count(text: string): number
}

export class TiktokenCounter implements TokenCounter {
  private encoding: Tiktoken | null = null

  count(text: string): number {
    if (!this.encoding) {
      this.encoding = getEncoding('cl100k_base')
    }
    return this.encoding.encode(text).length
  }
}
