import type { EmbeddingProvider } from "@coursemate/shared";
import { ConfigurationError } from "../errors.js";

const tokenPattern = /[\p{L}\p{N}]+/gu;

/**
 * Local embedding: a feature-hashed bag of words plus adjacent word pairs,
 * signed by a second hash bit and L2-normalised. Identical text always yields
 * the identical vector; text without any word maps to the zero vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(dimensions = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(tokenPattern) ?? [];

    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i += 1) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const slot = hash % this.dimensions;
      const sign = (hash >>> 31) === 1 ? -1 : 1;
      vector[slot] = (vector[slot] ?? 0) + sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
