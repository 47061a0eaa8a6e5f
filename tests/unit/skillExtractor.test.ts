/**
 * Unit tests for catalog-based skill extraction
 *
 * No network, no side effects
 */

import { describe, it, expect } from 'vitest';
import {
  SKILL_PATTERNS,
  buildJobSkills,
  extractSkills,
  normalizeSkillName,
  sortSkills
} from '../../src/utils/skillExtractor';

describe('extractSkills', () => {
  it('returns an empty set for empty text', () => {
    expect(extractSkills('').size).toBe(0);
  });

  it('returns an empty set when nothing in the text is in the catalog', () => {
    expect(extractSkills('Experienced gardener and baker').size).toBe(0);
  });

  it('recognizes skills case-insensitively and lower-cases them', () => {
    expect(sortSkills(extractSkills('I know Rust and Python'))).toEqual(['python', 'rust']);
    expect(sortSkills(extractSkills('DOCKER, Kubernetes, linux'))).toEqual(['docker', 'kubernetes', 'linux']);
  });

  it('deduplicates repeated mentions', () => {
    expect(sortSkills(extractSkills('Python, python and PYTHON'))).toEqual(['python']);
  });

  it('keeps punctuation-bearing and multi-word skills as single tokens', () => {
    expect(sortSkills(extractSkills('C++ engineer, Natural Language Processing'))).toEqual([
      'c++',
      'natural language processing'
    ]);
  });

  it('keeps the matched text rather than a canonical name', () => {
    expect(sortSkills(extractSkills('Node.js and nodejs, also NODE.JS'))).toEqual(['node.js', 'nodejs']);
  });

  it('lets overlapping patterns each contribute their own match', () => {
    expect(sortSkills(extractSkills('Strong PostgreSQL background'))).toEqual(['postgresql', 'sql']);
  });

  it('does not read java out of javascript', () => {
    expect(sortSkills(extractSkills('JavaScript and React'))).toEqual(['javascript', 'react']);
  });

  it('requires a word boundary after the skill', () => {
    expect(extractSkills('Rustacean, Reactive streams').size).toBe(0);
  });

  it('treats accented letters as part of the word', () => {
    expect(extractSkills('Pythonés Javaé Dockerñ').size).toBe(0);
    expect(sortSkills(extractSkills('Python, é Java'))).toEqual(['java', 'python']);
  });

  it('returns equal sets for repeated calls on the same text', () => {
    const text = 'Java, SQL, HTML and CSS; some NLP';
    const first = sortSkills(extractSkills(text));
    const second = sortSkills(extractSkills(text));
    expect(first).toEqual(['css', 'html', 'java', 'nlp', 'sql']);
    expect(second).toEqual(first);
  });

  it('never advances the shared catalog regexes', () => {
    extractSkills('rust rust rust');
    expect(SKILL_PATTERNS.every(pattern => pattern.lastIndex === 0)).toBe(true);
  });
});

describe('normalizeSkillName', () => {
  it('trims, lower-cases and collapses inner whitespace', () => {
    expect(normalizeSkillName('  Natural   Language Processing ')).toBe('natural language processing');
    expect(normalizeSkillName('GraphQL')).toBe('graphql');
  });
});

describe('buildJobSkills', () => {
  it('unions declared skills with skills found in the description', () => {
    expect(sortSkills(buildJobSkills('We run Linux', ['  Docker ', 'KUBERNETES']))).toEqual([
      'docker',
      'kubernetes',
      'linux'
    ]);
  });

  it('keeps declared skills that are not in the catalog', () => {
    expect(sortSkills(buildJobSkills('', ['Terraform']))).toEqual(['terraform']);
  });

  it('drops blank declared skills', () => {
    expect(buildJobSkills('', ['  ', '']).size).toBe(0);
  });
});

describe('sortSkills', () => {
  it('orders by code unit, not locale', () => {
    expect(sortSkills(new Set(['rust', 'c++', 'Zig', 'css']))).toEqual(['Zig', 'c++', 'css', 'rust']);
  });
});
