/** A normalized (lower-cased) skill identifier. */
export type SkillToken = string;

export type SkillSet = ReadonlySet<SkillToken>;
