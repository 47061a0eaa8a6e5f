import { MatchResult } from '../interfaces/domain/MatchResult';
import { ValidationError } from './errorHandler';

function compareJobIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareResults(a: MatchResult, b: MatchResult): number {
  return b.score - a.score || compareJobIds(a.jobId, b.jobId);
}

export function validateTopK(topK?: number): void {
  if (topK !== undefined && (!Number.isInteger(topK) || topK < 0)) {
    throw new ValidationError(`top_k must be a non-negative integer, got ${topK}`);
  }
}

/**
 * Order results by score descending, ties by ascending job id, and keep the
 * first `topK` when given. The input array is left untouched.
 */
export function rankResults(results: readonly MatchResult[], topK?: number): MatchResult[] {
  validateTopK(topK);

  const ranked = [...results].sort(compareResults);
  return topK === undefined ? ranked : ranked.slice(0, topK);
}
