import { SkillSet } from './Skill';

export interface Candidate {
  name?: string;
  rawText: string;
  skills: SkillSet;
}
