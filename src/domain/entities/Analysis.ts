/**
 * Analysis - Combined output of one job/candidate comparison
 */

import type { SkillMention } from './Skill.js';
import type { ScoreResult } from './Score.js';
import type { Roadmap } from './Roadmap.js';

export interface SkillGapRequest {
  jobMentions: SkillMention[];
  candidateMentions: SkillMention[];
}

export interface SkillGapReport {
  analysisId: string;
  generatedAt: string; // ISO timestamp
  matchAnalysis: ScoreResult;
  learningRoadmap: Roadmap;
}
