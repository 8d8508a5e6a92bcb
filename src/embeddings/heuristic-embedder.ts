/**
 * Deterministic feature-hashing embedder.
 *
 * Builds a fixed-dimension vector from two feature families:
 * - stemmed word tokens (so "search", "searching" and "searches" collide)
 * - character trigrams of each word, padded with '#', for typo tolerance
 *
 * Each feature is hashed with FNV-1a into a bucket and the vector is
 * L2-normalised, so cosine similarity reduces to a dot product. Output
 * depends only on the input text.
 */

import natural from 'natural';
import type { EmbeddingProvider, EmbeddingVector } from '../types/embeddings.js';

/** Default dimension, matching common small sentence-embedding models */
export const DEFAULT_EMBEDDING_DIMENSION = 384;

const WORD_WEIGHT = 1;
const TRIGRAM_WEIGHT = 0.5;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a string.
 */
export function fnv1a(input: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HeuristicEmbedder implements EmbeddingProvider {
  private readonly tokenizer = new natural.WordTokenizer();

  constructor(readonly dimension: number = DEFAULT_EMBEDDING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  /**
   * Synchronous vectorisation. Text without word characters yields the
   * zero vector.
   */
  vectorize(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = this.tokenizer.tokenize(text.toLowerCase()) ?? [];

    for (const word of words) {
      const stem = natural.PorterStemmer.stem(word);
      this.bump(vector, `w:${stem}`, WORD_WEIGHT);

      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.bump(vector, `t:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
      }
    }

    return normalize(vector);
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.vectorize(text);
  }

  private bump(vector: EmbeddingVector, feature: string, weight: number): void {
    const bucket = fnv1a(feature) % this.dimension;
    vector[bucket] += weight;
  }
}

function normalize(vector: EmbeddingVector): EmbeddingVector {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  if (sumSquares === 0) return vector;
  const norm = Math.sqrt(sumSquares);
  return vector.map((value) => value / norm);
}
