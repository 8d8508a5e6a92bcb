import { describe, it, expect } from 'vitest';
import { cosineSimilarity, similarityScore } from './cosine-similarity.js';

describe('cosineSimilarity', () => {
  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('spans -1 to 1', () => {
    expect(cosineSimilarity([1, 2, 3], [-1, -2, -3])).toBeCloseTo(-1, 10);
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
  });

  it('is symmetric', () => {
    const a = [0.2, 0.5, 0.1];
    const b = [0.4, 0.1, 0.9];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('scores a zero vector as unrelated', () => {
    expect(cosineSimilarity([0, 0], [3, 4])).toBe(0);
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it('rejects empty and mismatched vectors', () => {
    expect(() => cosineSimilarity([], [])).toThrow('Vectors must not be empty');
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vectors must have same length: got 2 and 3');
  });
});

describe('similarityScore', () => {
  it('passes positive similarity through', () => {
    expect(similarityScore([3, 4], [3, 4])).toBeCloseTo(1, 10);
    expect(similarityScore([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('clamps negative similarity to 0', () => {
    expect(similarityScore([1, 0], [-1, 0])).toBe(0);
  });

  it('scores vectors stored without an embedding as 0', () => {
    expect(similarityScore([], [1, 0])).toBe(0);
    expect(similarityScore([1, 0], [1, 0, 0])).toBe(0);
  });
});
