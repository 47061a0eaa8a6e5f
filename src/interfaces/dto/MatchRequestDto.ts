import { z } from 'zod';
import { ValidationError } from '../../utils/errorHandler';

const requiredString = () =>
  z.string({ required_error: 'is required', invalid_type_error: 'must be a string' });

export const CandidateInputSchema = z.object({
  name: requiredString().nullish(),
  raw_text: requiredString()
}, { required_error: 'is required', invalid_type_error: 'must be an object' });

export const JobInputSchema = z.object({
  id: requiredString(),
  title: requiredString(),
  description: requiredString(),
  required_skills: z.array(requiredString(), { invalid_type_error: 'must be an array of strings' }).nullish()
}, { invalid_type_error: 'must be an object' });

export const MatchRequestSchema = z.object({
  candidate: CandidateInputSchema,
  jobs: z.array(JobInputSchema, { required_error: 'is required', invalid_type_error: 'must be an array' }),
  top_k: z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a non-negative integer')
    .min(0, 'must be a non-negative integer')
    .nullish()
}, { required_error: 'request body is required', invalid_type_error: 'request body must be an object' });

export type MatchRequestInput = z.infer<typeof MatchRequestSchema>;

export interface JobInputDto {
  id: string;
  title: string;
  description: string;
  requiredSkills?: string[];
}

export interface MatchRequestDto {
  candidate: {
    name?: string;
    rawText: string;
  };
  jobs: JobInputDto[];
  topK?: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Validate a raw match body, rejecting it whole on the first bad shape. */
export function parseMatchRequest(body: unknown): MatchRequestDto {
  const parsed = MatchRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }

  const { candidate, jobs, top_k } = parsed.data;
  return {
    candidate: {
      name: candidate.name ?? undefined,
      rawText: candidate.raw_text
    },
    jobs: jobs.map(job => ({
      id: job.id,
      title: job.title,
      description: job.description,
      requiredSkills: job.required_skills ?? undefined
    })),
    topK: top_k ?? undefined
  };
}

function parseJobsField(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('jobs: must be a JSON array');
  }
}

function parseTopKField(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }

  const trimmed = raw.trim();
  if (trimmed === '') {
    return undefined;
  }
  // left as a string otherwise, so the schema rejects it
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

/**
 * Build a match body from multipart form fields plus the text extracted from
 * the uploaded resume. `jobs` arrives as a JSON string, `top_k` as a string.
 */
export function buildUploadMatchRequest(fields: Record<string, unknown>, resumeText: string): MatchRequestDto {
  return parseMatchRequest({
    candidate: {
      name: fields.name === '' ? undefined : fields.name,
      raw_text: resumeText
    },
    jobs: parseJobsField(fields.jobs),
    top_k: parseTopKField(fields.top_k)
  });
}
