/**
 * Weighted Scorer - Job requirements vs candidate skills
 *
 * Technical skills count three times as much as soft skills. Any required
 * skill without a recognised type still counts with the default weight,
 * so every requirement shows up in the denominator.
 */

import { z } from 'zod';
import type { RequiredSkill, SkillLookup } from '../entities/Skill.js';
import type { ScoreResult, ScoredSkill, SkillWeights } from '../entities/Score.js';

export const DEFAULT_SKILL_WEIGHTS: SkillWeights = {
  technical: 3,
  soft: 1,
  default: 1,
};

const skillWeightsSchema = z.object({
  technical: z.number().positive(),
  soft: z.number().positive(),
  default: z.number().positive(),
});

export const NO_REQUIREMENTS_SUMMARY = 'No required skills were identified in the job description.';

// =============================================================================
// WEIGHTED SCORER
// =============================================================================

export class WeightedScorer {
  private weights: SkillWeights;

  constructor(weights: Partial<SkillWeights> = {}) {
    this.weights = skillWeightsSchema.parse({ ...DEFAULT_SKILL_WEIGHTS, ...weights });
  }

  score(required: readonly RequiredSkill[], possessed: SkillLookup): ScoreResult {
    if (required.length === 0) {
      const empty: ScoreResult = {
        status: 'no_requirements',
        achievedScore: 0,
        maxPossibleScore: 0,
        matchPercentage: 0,
        summary: NO_REQUIREMENTS_SUMMARY,
        matching: [],
        missing: [],
      };
      return Object.freeze(empty);
    }

    let achievedScore = 0;
    let maxPossibleScore = 0;
    const matching: ScoredSkill[] = [];
    const missing: ScoredSkill[] = [];

    // Accumulate in input order; sorting happens only for presentation
    for (const requirement of required) {
      const weight = this.weightFor(requirement);
      const entry: ScoredSkill = requirement.type
        ? { skill: requirement.skill, type: requirement.type }
        : { skill: requirement.skill };

      maxPossibleScore += weight;

      if (possessed.has(requirement.skill)) {
        achievedScore += weight;
        matching.push(entry);
      } else {
        missing.push(entry);
      }
    }

    const matchPercentage =
      maxPossibleScore > 0 ? roundTo((achievedScore / maxPossibleScore) * 100, 2) : 0;

    const result: ScoreResult = {
      status: 'scored',
      achievedScore,
      maxPossibleScore,
      matchPercentage,
      summary: `The candidate's skills align with ${matchPercentage}% of the job's weighted requirements.`,
      matching: Object.freeze(sortBySkill(matching)),
      missing: Object.freeze(sortBySkill(missing)),
    };
    return Object.freeze(result);
  }

  weightFor(requirement: RequiredSkill): number {
    switch (requirement.type) {
      case 'technical':
        return this.weights.technical;
      case 'soft':
        return this.weights.soft;
      default:
        return this.weights.default;
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function sortBySkill(skills: ScoredSkill[]): ScoredSkill[] {
  return [...skills].sort((a, b) => (a.skill < b.skill ? -1 : a.skill > b.skill ? 1 : 0));
}
