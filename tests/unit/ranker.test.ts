/**
 * Unit tests for deterministic ranking and top-K truncation
 */

import { describe, it, expect } from 'vitest';
import { rankResults, validateTopK } from '../../src/utils/ranker';
import { ValidationError } from '../../src/utils/errorHandler';
import { MatchResult } from '../../src/interfaces/domain/MatchResult';

function result(jobId: string, score: number): MatchResult {
  return {
    jobId,
    score,
    similarity: score / 60,
    matchedSkills: [],
    explanation: `skill_jaccard=${(score / 60).toFixed(3)}`
  };
}

function ids(results: MatchResult[]): string[] {
  return results.map(r => r.jobId);
}

describe('rankResults', () => {
  const tied = [result('b', 30), result('a', 30), result('c', 10)];

  it('breaks score ties by ascending job id and truncates to top_k', () => {
    const ranked = rankResults(tied, 2);

    expect(ids(ranked)).toEqual(['a', 'b']);
    expect(ranked.map(r => r.score)).toEqual([30, 30]);
  });

  it('returns the full ranking when top_k is absent', () => {
    expect(ids(rankResults(tied))).toEqual(['a', 'b', 'c']);
  });

  it('matches a top_k equal to the number of results when top_k is absent', () => {
    expect(rankResults(tied)).toEqual(rankResults(tied, tied.length));
  });

  it('returns an empty list for top_k = 0', () => {
    expect(rankResults(tied, 0)).toEqual([]);
  });

  it('returns min(top_k, length) entries', () => {
    for (const k of [0, 1, 2, 3, 4, 10]) {
      expect(rankResults(tied, k)).toHaveLength(Math.min(k, tied.length));
    }
  });

  it('produces the same order for every input permutation', () => {
    const items = [result('d', 45), result('b', 30), result('a', 30), result('c', 10), result('e', 45)];
    const expected = ['d', 'e', 'a', 'b', 'c'];

    expect(ids(rankResults(items))).toEqual(expected);
    expect(ids(rankResults([...items].reverse()))).toEqual(expected);
    expect(ids(rankResults([items[2], items[4], items[0], items[3], items[1]]))).toEqual(expected);
  });

  it('orders by score descending, then job id ascending', () => {
    const ranked = rankResults([result('x', 12.5), result('m', 60), result('k', 12.5), result('z', 0)]);

    for (let i = 1; i < ranked.length; i++) {
      const previous = ranked[i - 1];
      const current = ranked[i];
      expect(previous.score).toBeGreaterThanOrEqual(current.score);
      if (previous.score === current.score) {
        expect(previous.jobId < current.jobId).toBe(true);
      }
    }
    expect(ids(ranked)).toEqual(['m', 'k', 'x', 'z']);
  });

  it('compares job ids by code unit', () => {
    expect(ids(rankResults([result('b', 1), result('B', 1), result('a', 1)]))).toEqual(['B', 'a', 'b']);
  });

  it('does not mutate its input', () => {
    const input = [result('b', 30), result('a', 30)];
    rankResults(input, 1);
    expect(ids(input)).toEqual(['b', 'a']);
  });

  it('returns an empty list for no results', () => {
    expect(rankResults([], 5)).toEqual([]);
  });

  it('rejects a negative top_k', () => {
    expect(() => rankResults(tied, -1)).toThrow(ValidationError);
    expect(() => rankResults(tied, -1)).toThrow('top_k must be a non-negative integer, got -1');
  });

  it('rejects a fractional top_k', () => {
    expect(() => rankResults(tied, 1.5)).toThrow('top_k must be a non-negative integer, got 1.5');
  });
});

describe('validateTopK', () => {
  it('accepts undefined and non-negative integers', () => {
    expect(() => validateTopK(undefined)).not.toThrow();
    expect(() => validateTopK(0)).not.toThrow();
    expect(() => validateTopK(7)).not.toThrow();
  });
});
