/**
 * Skill - Canonical vocabulary records
 *
 * Mentions arrive from the text extractor with whatever spelling the
 * source document used. Everything downstream of the normalizer works
 * with canonical ids only.
 */

// =============================================================================
// ENUMERATIONS
// =============================================================================

export type SkillType = 'technical' | 'soft';

export type Difficulty = 'Beginner' | 'Intermediate' | 'Advanced';

export const SKILL_TYPES: readonly SkillType[] = ['technical', 'soft'];

export const DIFFICULTIES: readonly Difficulty[] = ['Beginner', 'Intermediate', 'Advanced'];

// =============================================================================
// MENTIONS
// =============================================================================

/**
 * One raw occurrence of a skill-like phrase, as emitted by the extractor.
 * `inferredType` is undefined when the extractor could not classify it.
 */
export interface SkillMention {
  text: string;
  inferredType?: SkillType;
  sourceSpan?: unknown;
}

// =============================================================================
// CANONICAL SKILLS
// =============================================================================

export interface CanonicalSkill {
  id: string;
  type: SkillType;
  prerequisites: readonly string[];
  durationWeeks: number;
  difficulty: Difficulty;
}

export interface SkillTimeline {
  durationWeeks: number;
  difficulty: Difficulty;
}

/**
 * Canonical id -> resolved type. Unique by id; a skill mentioned as both
 * technical and soft resolves to technical.
 */
export type SkillSet = ReadonlyMap<string, SkillType>;

/**
 * Element of an ordered requirement list. Order is the order of first
 * mention in the job description.
 */
export interface RequiredSkill {
  skill: string;
  type?: SkillType;
}

/**
 * Anything that can answer "does the candidate already have this skill".
 * A SkillSet satisfies it, as does a plain Set of ids.
 */
export interface SkillLookup {
  has(skill: string): boolean;
}
