/**
 * Skill Normalizer - Free-text skill mentions to canonical ids
 *
 * Reconciles the spellings an extractor emits ("ReactJS", "react.js",
 * "React") into one vocabulary:
 * 1. Exact, case-insensitive alias lookup in the skill table
 * 2. Short alphabetic tokens (<= 4 chars) become acronyms ("sql" -> "SQL")
 * 3. Anything else is title-cased
 *
 * This is best-effort. Two spellings of one skill that the alias table
 * doesn't know about will not be merged.
 */

import type { RequiredSkill, SkillMention, SkillSet, SkillType } from '../entities/Skill.js';
import { getSkillTable, type SkillTable } from '../skills/SkillTable.js';

const ACRONYM_PATTERN = /^[a-z]{1,4}$/;

// =============================================================================
// SKILL NORMALIZER
// =============================================================================

export class SkillNormalizer {
  private table: SkillTable;

  constructor(table?: SkillTable) {
    this.table = table || getSkillTable();
  }

  /**
   * Canonical id for one piece of text, or null when the text is blank.
   */
  canonicalize(text: string): string | null {
    const trimmed = text.trim();
    if (!trimmed) return null;

    const lowered = trimmed.toLowerCase();

    const aliased = this.table.resolveAlias(lowered);
    if (aliased) return aliased;

    if (ACRONYM_PATTERN.test(lowered)) {
      return lowered.toUpperCase();
    }

    return titleCase(trimmed);
  }

  /**
   * Candidate side: a set keyed by canonical id.
   */
  normalize(mentions: readonly SkillMention[]): SkillSet {
    const set = new Map<string, SkillType>();
    for (const entry of this.merge(mentions)) {
      // Untyped mentions only reach a SkillSet through the table's own type
      set.set(entry.skill, entry.type ?? this.table.get(entry.skill)?.type ?? 'technical');
    }
    return set;
  }

  /**
   * Job side: canonical ids in order of first mention, duplicates merged.
   */
  normalizeOrdered(mentions: readonly SkillMention[]): RequiredSkill[] {
    return this.merge(mentions);
  }

  private merge(mentions: readonly SkillMention[]): RequiredSkill[] {
    const merged = new Map<string, RequiredSkill>();

    for (const mention of mentions) {
      const id = this.canonicalize(mention.text);
      if (!id) continue;

      const existing = merged.get(id);
      if (!existing) {
        merged.set(id, { skill: id, type: mention.inferredType });
        continue;
      }

      existing.type = mergeTypes(existing.type, mention.inferredType);
    }

    return [...merged.values()].map((entry) =>
      entry.type ? { skill: entry.skill, type: entry.type } : { skill: entry.skill }
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Technical wins over soft so a skill is never under-weighted; an
 * unspecified type takes whichever type is known.
 */
export function mergeTypes(a: SkillType | undefined, b: SkillType | undefined): SkillType | undefined {
  if (a === 'technical' || b === 'technical') return 'technical';
  if (a === 'soft' || b === 'soft') return 'soft';
  return undefined;
}

export function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
