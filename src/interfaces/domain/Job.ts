import { SkillSet } from './Skill';

export interface Job {
  id: string;
  title: string;
  description: string;
  requiredSkills?: readonly string[];
  /** Normalized required skills ∪ skills extracted from the description. */
  skills: SkillSet;
}
