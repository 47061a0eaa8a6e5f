import { SkillToken } from './Skill';

/** One job scored against one candidate. Immutable once produced. */
export interface MatchResult {
  readonly jobId: string;
  /** Composite score on the 0-100 scale, rounded to 2 decimals. */
  readonly score: number;
  /** Jaccard similarity of the two skill sets, in [0, 1]. */
  readonly similarity: number;
  /** Candidate skills ∩ job skills, sorted. */
  readonly matchedSkills: readonly SkillToken[];
  readonly explanation: string;
}
