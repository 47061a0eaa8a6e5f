import { Candidate } from '../../interfaces/domain/Candidate';
import { Job } from '../../interfaces/domain/Job';
import { MatchResult } from '../../interfaces/domain/MatchResult';
import { JobInputDto, MatchRequestDto } from '../../interfaces/dto/MatchRequestDto';
import { DEFAULT_SIGNALS, ScoringSignal, scoreMatch } from '../../utils/matchScorer';
import { rankResults, validateTopK } from '../../utils/ranker';
import { buildJobSkills, extractSkills } from '../../utils/skillExtractor';
import { logger } from '../../utils/logger';

export class MatchService {
  constructor(private readonly signals: readonly ScoringSignal[] = DEFAULT_SIGNALS) {}

  buildCandidate(input: MatchRequestDto['candidate']): Candidate {
    return {
      name: input.name,
      rawText: input.rawText,
      skills: extractSkills(input.rawText)
    };
  }

  buildJob(input: JobInputDto): Job {
    return {
      id: input.id,
      title: input.title,
      description: input.description,
      requiredSkills: input.requiredSkills,
      skills: buildJobSkills(input.description, input.requiredSkills)
    };
  }

  private async scoreJob(candidate: Candidate, input: JobInputDto): Promise<MatchResult> {
    return scoreMatch(candidate, this.buildJob(input), this.signals);
  }

  /**
   * Score every job against the candidate independently, then rank once all
   * scores are in. Completion order of the per-job tasks never reaches the
   * output.
   */
  async match(request: MatchRequestDto): Promise<MatchResult[]> {
    validateTopK(request.topK);
    const candidate = this.buildCandidate(request.candidate);

    const scored = await Promise.all(
      request.jobs.map(job => this.scoreJob(candidate, job))
    );

    const ranked = rankResults(scored, request.topK);

    logger.info('Matched candidate against jobs', {
      candidate: candidate.name || 'anonymous',
      candidateSkills: candidate.skills.size,
      jobCount: request.jobs.length,
      returned: ranked.length
    });

    return ranked;
  }
}
