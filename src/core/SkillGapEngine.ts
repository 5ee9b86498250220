/**
 * Skill Gap Engine - Process-wide wiring
 *
 * Loads the skill table and curated catalog once, picks a resource
 * resolver from configuration and hands out services that share them.
 */

import { loadConfig, type AppConfig } from '../infrastructure/config/config.js';
import { loadSkillTable, type SkillTable } from '../domain/skills/SkillTable.js';
import { ResourceCatalog } from '../domain/services/ResourceCatalog.js';
import { SkillNormalizer } from '../domain/services/SkillNormalizer.js';
import { WeightedScorer } from '../domain/services/WeightedScorer.js';
import { RoadmapBuilder } from '../domain/services/RoadmapBuilder.js';
import { SkillGapAnalyzer } from '../domain/services/SkillGapAnalyzer.js';
import {
  NullResourceResolver,
  type ResourceResolver,
} from '../integrations/resources/ResourceResolver.js';
import { YouTubeClient } from '../integrations/youtube/YouTubeClient.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SkillGapEngine {
  config: AppConfig;
  table: SkillTable;
  catalog: ResourceCatalog;
  resolver: ResourceResolver;
  normalizer: SkillNormalizer;
  scorer: WeightedScorer;
  roadmapBuilder: RoadmapBuilder;
  analyzer: SkillGapAnalyzer;
}

export interface SkillGapEngineOverrides {
  table?: SkillTable;
  catalog?: ResourceCatalog;
  resolver?: ResourceResolver;
}

// =============================================================================
// FACTORY
// =============================================================================

export function createResourceResolver(config: AppConfig): ResourceResolver {
  if (config.youtubeApiKey) {
    return new YouTubeClient({ apiKey: config.youtubeApiKey });
  }
  console.warn('[SkillGapEngine] YOUTUBE_API_KEY not set. Only curated resources will be used.');
  return new NullResourceResolver();
}

/**
 * Build an engine whose table and catalog both come from `config`. Each
 * call loads its own table; `getSkillGapEngine` keeps the shared one.
 */
export function createSkillGapEngine(
  config: AppConfig = loadConfig(),
  overrides: SkillGapEngineOverrides = {}
): SkillGapEngine {
  const table = overrides.table || loadSkillTable(config.skillTablePath);
  const catalog = overrides.catalog || ResourceCatalog.fromFile(config.resourceCatalogPath);
  const resolver = overrides.resolver || createResourceResolver(config);

  const normalizer = new SkillNormalizer(table);
  const scorer = new WeightedScorer();
  const roadmapBuilder = new RoadmapBuilder(
    {
      maxResourcesPerSkill: config.resourceMaxResults,
      resourceTimeoutMs: config.resourceLookupTimeoutMs,
    },
    { table, catalog, resolver }
  );
  const analyzer = new SkillGapAnalyzer({ normalizer, scorer, roadmapBuilder });

  return { config, table, catalog, resolver, normalizer, scorer, roadmapBuilder, analyzer };
}

// =============================================================================
// SINGLETON
// =============================================================================

let engineInstance: SkillGapEngine | null = null;

export function getSkillGapEngine(): SkillGapEngine {
  if (!engineInstance) {
    engineInstance = createSkillGapEngine();
  }
  return engineInstance;
}

export function resetSkillGapEngine(): void {
  engineInstance = null;
}
