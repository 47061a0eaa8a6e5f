import { MatchResult } from '../domain/MatchResult';

export interface MatchResultDto {
  job_id: string;
  score: number;
  matched_skills: string[];
  explanation: string;
}

export function toMatchResponse(results: readonly MatchResult[]): MatchResultDto[] {
  return results.map(result => ({
    job_id: result.jobId,
    score: result.score,
    matched_skills: [...result.matchedSkills],
    explanation: result.explanation
  }));
}
