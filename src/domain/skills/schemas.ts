/**
 * Boundary Schemas
 *
 * Zod schemas for data handed to the engine by external collaborators:
 * the skill table document, the curated resource catalog and the
 * extractor's skill mentions.
 */

import { z } from 'zod';
import type { SkillMention } from '../entities/Skill.js';

// =============================================================================
// SKILL TABLE DOCUMENT
// =============================================================================

export const skillTypeSchema = z.enum(['technical', 'soft']);

export const difficultySchema = z.enum(['Beginner', 'Intermediate', 'Advanced']);

const durationWeeksSchema = z.number().int().min(0);

export const skillEntrySchema = z.object({
  type: skillTypeSchema.default('technical'),
  prerequisites: z.array(z.string().min(1)).default([]),
  durationWeeks: durationWeeksSchema,
  difficulty: difficultySchema,
});

export const skillTableDocumentSchema = z.object({
  aliases: z.record(z.string().min(1)).default({}),
  skills: z.record(skillEntrySchema),
  defaults: z
    .object({
      durationWeeks: durationWeeksSchema,
      difficulty: difficultySchema,
    })
    .default({ durationWeeks: 4, difficulty: 'Intermediate' }),
});

export type SkillTableDocument = z.input<typeof skillTableDocumentSchema>;
export type ParsedSkillTableDocument = z.output<typeof skillTableDocumentSchema>;

// =============================================================================
// CURATED RESOURCE CATALOG
// =============================================================================

export const curatedResourceSchema = z.object({
  title: z.string().min(1),
  url: z.string().url(),
  kind: z.literal('curated').default('curated'),
});

export const resourceCatalogSchema = z.record(z.array(curatedResourceSchema));

// Outer shape only; skills and resources are validated one at a time
export const resourceCatalogShapeSchema = z.record(z.unknown());

export const resourceListSchema = z.array(z.unknown());

export type ResourceCatalogDocument = z.input<typeof resourceCatalogSchema>;

// =============================================================================
// SKILL MENTIONS
// =============================================================================

// Unknown or missing types are kept as "unspecified" rather than rejected;
// the scorer gives them the default weight.
const rawMentionSchema = z.object({
  text: z.string().default(''),
  inferredType: z.unknown().optional(),
  sourceSpan: z.unknown().optional(),
});

export const mentionListSchema = z.array(z.unknown());

/**
 * Validate an extractor payload and convert it into typed mentions.
 * Only a non-array payload throws; entries that are not mention objects,
 * or whose text is blank after trimming, are dropped.
 */
export function parseMentions(input: unknown): SkillMention[] {
  const raw = mentionListSchema.parse(input);
  const mentions: SkillMention[] = [];

  for (const item of raw) {
    const parsed = rawMentionSchema.safeParse(item);
    if (!parsed.success) continue;

    const entry = parsed.data;
    if (!entry.text.trim()) continue;

    const type = skillTypeSchema.safeParse(entry.inferredType);
    const mention: SkillMention = { text: entry.text };
    if (type.success) {
      mention.inferredType = type.data;
    }
    if (entry.sourceSpan !== undefined) {
      mention.sourceSpan = entry.sourceSpan;
    }
    mentions.push(mention);
  }

  return mentions;
}
