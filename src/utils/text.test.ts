/**
 * Tests for text helpers
 */

import { describe, it, expect } from 'vitest';
import { truncateEnd, diceSimilarity } from './text.js';

describe('truncateEnd', () => {
  it('should leave short text untouched', () => {
    expect(truncateEnd('short', 10)).toBe('short');
  });

  it('should keep the opening and append an ellipsis', () => {
    expect(truncateEnd('abcdefghijkl', 8)).toBe('abcde...');
  });

  it('should never exceed the limit', () => {
    expect(truncateEnd('一二三四五六七八九十', 6).length).toBeLessThanOrEqual(6);
  });
});

describe('diceSimilarity', () => {
  it('should return 1 for identical text', () => {
    expect(diceSimilarity('什么是向量数据库？', '什么是向量数据库？')).toBe(1);
  });

  it('should ignore punctuation, spacing and case', () => {
    expect(diceSimilarity('What is  a B-Tree?', 'what is a btree')).toBe(1);
  });

  it('should return 0 for unrelated text', () => {
    expect(diceSimilarity('abc', 'xyz')).toBe(0);
  });

  it('should score near-duplicates highly', () => {
    const score = diceSimilarity('为什么Python适合初学者？', '为什么Python很适合初学者？');
    expect(score).toBeGreaterThan(0.85);
  });

  it('should score partially overlapping text in between', () => {
    // bigrams: ab bc cd / ab bx xy
    expect(diceSimilarity('abcd', 'abxy')).toBeCloseTo(1 / 3);
  });
});
