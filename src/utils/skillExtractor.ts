import { SkillSet, SkillToken } from '../interfaces/domain/Skill';

// \b is ASCII-only in JS; this also treats letters such as é as word characters
const WORD_END = '(?![\\p{L}\\p{M}\\p{N}\\p{Pc}])';

const SKILL_PATTERN_SOURCES = [
  'rust' + WORD_END,
  'c\\+\\+',
  'python' + WORD_END,
  'java' + WORD_END,
  'sql' + WORD_END,
  'postgresql' + WORD_END,
  'docker' + WORD_END,
  'kubernetes' + WORD_END,
  'linux' + WORD_END,
  'html' + WORD_END,
  'css' + WORD_END,
  'javascript' + WORD_END,
  'react' + WORD_END,
  'node\\.?js' + WORD_END,
  'nlp' + WORD_END,
  'natural language processing' + WORD_END
] as const;

/**
 * Process-wide skill catalog, compiled once on load and never mutated.
 * Matching goes through `matchAll`, which works on a copy of each regex,
 * so `lastIndex` on these instances is never advanced.
 */
export const SKILL_PATTERNS: readonly RegExp[] = Object.freeze(
  SKILL_PATTERN_SOURCES.map(source => new RegExp(source, 'giu'))
);

/**
 * Recognize catalog skills in free text.
 *
 * Each match contributes its own lower-cased text, so `Node.js` and `nodejs`
 * come out as two distinct tokens.
 */
export function extractSkills(text: string): Set<SkillToken> {
  const found = new Set<SkillToken>();
  if (!text) {
    return found;
  }

  for (const pattern of SKILL_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.add(match[0].toLowerCase());
    }
  }

  return found;
}

export function normalizeSkillName(rawName: string): SkillToken {
  return rawName
    .toLowerCase()
    .trim()
    .replace(/\s+/g, ' ');
}

function compareTokens(a: SkillToken, b: SkillToken): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Code-unit ordering, independent of locale. */
export function sortSkills(skills: Iterable<SkillToken>): SkillToken[] {
  return Array.from(skills).sort(compareTokens);
}

export function buildJobSkills(description: string, requiredSkills?: readonly string[]): SkillSet {
  const skills = extractSkills(description);

  for (const declared of requiredSkills || []) {
    const normalized = normalizeSkillName(declared);
    if (normalized) {
      skills.add(normalized);
    }
  }

  return skills;
}
