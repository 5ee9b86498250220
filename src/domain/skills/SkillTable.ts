/**
 * Canonical Skill Table
 *
 * Alias -> canonical id lookup plus per-skill metadata (prerequisites,
 * learning time, difficulty). Loaded once per process and read-only
 * afterwards; tests build their own tables with `SkillTable.fromDocument`.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { ZodError } from 'zod';
import type { CanonicalSkill, SkillTimeline } from '../entities/Skill.js';
import {
  skillTableDocumentSchema,
  type ParsedSkillTableDocument,
  type SkillTableDocument,
} from './schemas.js';

// =============================================================================
// ERRORS
// =============================================================================

export type SkillTableErrorCode = 'INVALID_DOCUMENT' | 'SELF_PREREQUISITE' | 'READ_FAILED';

export class SkillTableError extends Error {
  constructor(
    message: string,
    public code: SkillTableErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SkillTableError';
  }
}

export const DEFAULT_SKILL_TABLE_PATH = path.resolve(__dirname, '../../../data/skill-table.json');

// =============================================================================
// SKILL TABLE
// =============================================================================

export class SkillTable {
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly skills: ReadonlyMap<string, CanonicalSkill>;
  private readonly defaults: SkillTimeline;

  private constructor(document: ParsedSkillTableDocument) {
    const skills = new Map<string, CanonicalSkill>();
    const aliases = new Map<string, string>();

    for (const [id, entry] of Object.entries(document.skills)) {
      if (entry.prerequisites.includes(id)) {
        throw new SkillTableError(
          `Skill lists itself as a prerequisite: ${id}`,
          'SELF_PREREQUISITE',
          { skill: id }
        );
      }

      skills.set(
        id,
        Object.freeze({
          id,
          type: entry.type,
          prerequisites: Object.freeze([...new Set(entry.prerequisites)]),
          durationWeeks: entry.durationWeeks,
          difficulty: entry.difficulty,
        })
      );
      aliases.set(id.toLowerCase(), id);
    }

    // Explicit aliases win over the implicit id -> id entries
    for (const [alias, id] of Object.entries(document.aliases)) {
      if (!skills.has(id)) {
        throw new SkillTableError(
          `Alias "${alias}" points at unknown skill: ${id}`,
          'INVALID_DOCUMENT',
          { alias, target: id }
        );
      }
      const key = alias.trim().toLowerCase();
      if (key) aliases.set(key, id);
    }

    this.skills = skills;
    this.aliases = aliases;
    this.defaults = Object.freeze({ ...document.defaults });
  }

  /**
   * Validate a raw document and build a table from it.
   */
  static fromDocument(input: unknown): SkillTable {
    try {
      return new SkillTable(skillTableDocumentSchema.parse(input));
    } catch (error) {
      if (error instanceof ZodError) {
        throw new SkillTableError('Invalid skill table document', 'INVALID_DOCUMENT', {
          issues: error.issues,
        });
      }
      throw error;
    }
  }

  static fromFile(filePath: string): SkillTable {
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new SkillTableError(`Could not read skill table: ${filePath}`, 'READ_FAILED', {
        filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new SkillTableError(`Skill table is not valid JSON: ${filePath}`, 'INVALID_DOCUMENT', {
        filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    return SkillTable.fromDocument(document);
  }

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  get size(): number {
    return this.skills.size;
  }

  /**
   * Case-insensitive exact alias match. Returns null for unknown text.
   */
  resolveAlias(text: string): string | null {
    return this.aliases.get(text.trim().toLowerCase()) ?? null;
  }

  has(id: string): boolean {
    return this.skills.has(id);
  }

  get(id: string): CanonicalSkill | undefined {
    return this.skills.get(id);
  }

  getPrerequisites(id: string): readonly string[] {
    return this.skills.get(id)?.prerequisites ?? [];
  }

  /**
   * Learning time for a skill; skills missing from the table get the
   * document defaults.
   */
  getTimeline(id: string): SkillTimeline {
    const skill = this.skills.get(id);
    if (!skill) return this.defaults;
    return { durationWeeks: skill.durationWeeks, difficulty: skill.difficulty };
  }

  ids(): string[] {
    return [...this.skills.keys()];
  }
}

// =============================================================================
// PROCESS-WIDE INSTANCE
// =============================================================================

let tableInstance: SkillTable | null = null;

export function loadSkillTable(filePath: string = DEFAULT_SKILL_TABLE_PATH): SkillTable {
  const table = SkillTable.fromFile(filePath);
  console.log(`[SkillTable] Loaded ${table.size} canonical skills from ${filePath}`);
  return table;
}

/**
 * Returns the shared table, loading it on first use. Later calls ignore
 * `filePath`; call `resetSkillTable()` first to swap tables.
 */
export function getSkillTable(filePath?: string): SkillTable {
  if (!tableInstance) {
    tableInstance = loadSkillTable(filePath);
  }
  return tableInstance;
}

export function resetSkillTable(): void {
  tableInstance = null;
}

export type { SkillTableDocument };
