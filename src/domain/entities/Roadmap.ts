/**
 * Roadmap - Ordered learning plan for missing skills
 */

import type { Difficulty } from './Skill.js';

// =============================================================================
// RESOURCES
// =============================================================================

export type ResourceKind = 'curated' | 'external';

export interface Resource {
  title: string;
  url: string;
  kind: ResourceKind;
}

// =============================================================================
// ORDERING
// =============================================================================

/**
 * 'fallback' means a dependency cycle (or a round limit) stopped the
 * topological pass and `unorderedSkills` were appended as-is.
 */
export type RoadmapOrdering = 'topological' | 'fallback';

export interface LearningOrder {
  skills: string[];
  ordering: RoadmapOrdering;
  unorderedSkills: string[];
  rounds: number;
}

// =============================================================================
// ROADMAP
// =============================================================================

export interface RoadmapStep {
  order: number; // 1-based
  skill: string;
  durationWeeks: number;
  difficulty: Difficulty;
  cumulativeWeeks: number;
  resources: Resource[];
}

export interface Roadmap {
  steps: RoadmapStep[];
  totalWeeks: number;
  ordering: RoadmapOrdering;
  unorderedSkills: string[];
}
