/**
 * Domain Services Module
 *
 * The skill-gap pipeline:
 * - Normalization: free-text mentions to canonical skill ids
 * - Scoring: weighted match between job and candidate
 * - Roadmap: ordered learning plan with timelines and resources
 */

export { SkillNormalizer, mergeTypes, titleCase } from './SkillNormalizer.js';

export {
  WeightedScorer,
  DEFAULT_SKILL_WEIGHTS,
  NO_REQUIREMENTS_SUMMARY,
} from './WeightedScorer.js';

export {
  RoadmapBuilder,
  type RoadmapBuilderConfig,
  type RoadmapBuilderDeps,
} from './RoadmapBuilder.js';

export { ResourceCatalog, DEFAULT_RESOURCE_CATALOG_PATH } from './ResourceCatalog.js';

export { SkillGapAnalyzer, type SkillGapAnalyzerDeps } from './SkillGapAnalyzer.js';
