import { EmbeddingProvider } from '@/providers/ai/ai-provider.js'

/**
 * Bag-of-words embeddings: one dimension per vocabulary word, so texts that
 * share more words end up closer.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly embeddedTexts: string[] = []

  constructor(private readonly vocabulary: string[]) {}

  get dimensions(): number {
    return this.vocabulary.length + 1
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text])
    return embedding
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.embeddedTexts.push(...texts)
    return texts.map((text) => this.embed(text))
  }

  private embed(text: string): number[] {
    const words = text.toLowerCase().split(/\W+/)
    // A constant last component keeps texts without known words off the origin.
    return [
      ...this.vocabulary.map(
        (word) => words.filter((candidate) => candidate === word).length
      ),
      0.1
    ]
  }
}
