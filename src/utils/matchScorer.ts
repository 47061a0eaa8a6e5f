import { Candidate } from '../interfaces/domain/Candidate';
import { Job } from '../interfaces/domain/Job';
import { MatchResult } from '../interfaces/domain/MatchResult';
import { SkillSet, SkillToken } from '../interfaces/domain/Skill';
import { InvariantViolation } from './errorHandler';
import { sortSkills } from './skillExtractor';

export interface ScoringContext {
  candidate: Candidate;
  job: Job;
  skillSimilarity: number;
}

/**
 * A weighted contributor to the composite score. `evaluate` returns a value
 * in [0, 1]; anything outside is clamped.
 */
export interface ScoringSignal {
  name: string;
  weight: number;
  evaluate: (context: ScoringContext) => number;
}

const SCORE_SCALE = 100;
const SCORE_DECIMALS = 2;

export const SCORING_WEIGHTS = {
  skill: 0.6,
  experience: 0.25,
  other: 0.15
} as const;

// experience and other have no data source yet; they stay at 0
const defaultSignals: ScoringSignal[] = [
  { name: 'skill', weight: SCORING_WEIGHTS.skill, evaluate: context => context.skillSimilarity },
  { name: 'experience', weight: SCORING_WEIGHTS.experience, evaluate: () => 0 },
  { name: 'other', weight: SCORING_WEIGHTS.other, evaluate: () => 0 }
];

export const DEFAULT_SIGNALS: readonly ScoringSignal[] = Object.freeze(defaultSignals);

export function intersectSkills(a: SkillSet, b: SkillSet): Set<SkillToken> {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  const shared = new Set<SkillToken>();
  for (const skill of smaller) {
    if (larger.has(skill)) {
      shared.add(skill);
    }
  }
  return shared;
}

/** |A ∩ B| / |A ∪ B|, with two empty sets counting as a perfect match. */
export function jaccardSimilarity(a: SkillSet, b: SkillSet): number {
  if (a.size === 0 && b.size === 0) {
    return 1;
  }

  const intersection = intersectSkills(a, b).size;
  const union = a.size + b.size - intersection;
  return intersection / union;
}

/**
 * The scaled value is re-read at 15 significant digits first, so a blend
 * that should be exactly x.xx5 but lands a few ulps below still rounds up.
 */
export function roundHalfAwayFromZero(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  return (Math.sign(value) * Math.round(scaled)) / factor;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Weighted blend of the signals on the 0-100 scale. Scaled and rounded once.
 */
export function compositeScore(context: ScoringContext, signals: readonly ScoringSignal[]): number {
  const blended = signals.reduce(
    (total, signal) => total + signal.weight * clamp01(signal.evaluate(context)),
    0
  );
  return roundHalfAwayFromZero(SCORE_SCALE * blended, SCORE_DECIMALS);
}

export function formatExplanation(similarity: number): string {
  return `skill_jaccard=${similarity.toFixed(3)}`;
}

function assertMatchedSubset(matched: Iterable<SkillToken>, candidate: SkillSet, job: SkillSet, jobId: string): void {
  for (const skill of matched) {
    if (!candidate.has(skill) || !job.has(skill)) {
      throw new InvariantViolation(`matched skill "${skill}" for job ${jobId} is outside the candidate/job intersection`);
    }
  }
}

export function scoreMatch(
  candidate: Candidate,
  job: Job,
  signals: readonly ScoringSignal[] = DEFAULT_SIGNALS
): MatchResult {
  const similarity = jaccardSimilarity(candidate.skills, job.skills);
  const matched = intersectSkills(candidate.skills, job.skills);
  assertMatchedSubset(matched, candidate.skills, job.skills, job.id);

  return Object.freeze({
    jobId: job.id,
    score: compositeScore({ candidate, job, skillSimilarity: similarity }, signals),
    similarity,
    matchedSkills: Object.freeze(sortSkills(matched)),
    explanation: formatExplanation(similarity)
  });
}
