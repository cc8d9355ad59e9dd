import type { EmbeddingProvider } from "@coursemate/shared";

/**
 * One dimension per vocabulary word (its occurrence count) plus a constant
 * dimension, so unrelated texts still have a non-zero vector.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  embedCalls = 0;
  failNext: Error | null = null;

  constructor(private readonly vocabulary: string[]) {
    this.dimensions = vocabulary.length + 1;
  }

  async embed(text: string): Promise<number[]> {
    this.embedCalls += 1;
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    return this.vectorFor(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    const vector = this.vocabulary.map(
      (term) => words.filter((word) => word === term.toLowerCase()).length
    );
    vector.push(0.01);
    return vector;
  }
}
