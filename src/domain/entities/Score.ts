/**
 * Score - Weighted match results
 */

import type { SkillType } from './Skill.js';

export type ScoreStatus = 'scored' | 'no_requirements';

export interface ScoredSkill {
  skill: string;
  type?: SkillType;
}

export interface SkillWeights {
  technical: number;
  soft: number;
  default: number; // Unspecified or unknown type; must stay > 0
}

export interface ScoreResult {
  status: ScoreStatus;
  achievedScore: number;
  maxPossibleScore: number;
  matchPercentage: number; // 0-100, two decimals
  summary: string;
  matching: readonly ScoredSkill[];
  missing: readonly ScoredSkill[];
}
