/**
 * SkillBridge Engine - Main Entry Point
 *
 * Skill normalization, weighted match scoring and learning roadmaps for
 * job/candidate skill gaps.
 */

import 'dotenv/config';

// Wiring
export {
  createSkillGapEngine,
  createResourceResolver,
  getSkillGapEngine,
  resetSkillGapEngine,
  type SkillGapEngine,
  type SkillGapEngineOverrides,
} from './core/SkillGapEngine.js';

// Configuration
export { loadConfig, ConfigError, type AppConfig } from './infrastructure/config/config.js';

// Domain
export * from './domain/entities/index.js';
export * from './domain/services/index.js';
export * from './domain/skills/index.js';

// Resource lookups
export * from './integrations/resources/ResourceResolver.js';
export { YouTubeClient } from './integrations/youtube/YouTubeClient.js';
export type { YouTubeConfig } from './integrations/youtube/types.js';
