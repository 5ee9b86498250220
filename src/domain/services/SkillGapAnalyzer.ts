/**
 * Skill Gap Analyzer - One job description vs one candidate
 *
 * Runs the full pipeline: normalize both sides, score the match, then
 * build a learning roadmap for whatever is missing. Extractor output is
 * validated here, at the edge of the domain layer.
 */

import { v4 as uuid } from 'uuid';
import type { SkillGapReport, SkillGapRequest } from '../entities/Analysis.js';
import type { Roadmap } from '../entities/Roadmap.js';
import type { SkillMention } from '../entities/Skill.js';
import { parseMentions } from '../skills/schemas.js';
import { SkillNormalizer } from './SkillNormalizer.js';
import { WeightedScorer } from './WeightedScorer.js';
import { RoadmapBuilder } from './RoadmapBuilder.js';

function emptyRoadmap(): Roadmap {
  return { steps: [], totalWeeks: 0, ordering: 'topological', unorderedSkills: [] };
}

export interface SkillGapAnalyzerDeps {
  normalizer?: SkillNormalizer;
  scorer?: WeightedScorer;
  roadmapBuilder?: RoadmapBuilder;
}

// =============================================================================
// SKILL GAP ANALYZER
// =============================================================================

export class SkillGapAnalyzer {
  private normalizer: SkillNormalizer;
  private scorer: WeightedScorer;
  private roadmapBuilder: RoadmapBuilder;

  constructor(deps: SkillGapAnalyzerDeps = {}) {
    this.normalizer = deps.normalizer || new SkillNormalizer();
    this.scorer = deps.scorer || new WeightedScorer();
    this.roadmapBuilder = deps.roadmapBuilder || new RoadmapBuilder();
  }

  /**
   * Analyze typed mentions.
   */
  async analyze(request: SkillGapRequest): Promise<SkillGapReport> {
    const required = this.normalizer.normalizeOrdered(request.jobMentions);
    const possessed = this.normalizer.normalize(request.candidateMentions);

    const matchAnalysis = this.scorer.score(required, possessed);
    const missing = matchAnalysis.missing.map((entry) => entry.skill);

    const learningRoadmap =
      missing.length > 0
        ? await this.roadmapBuilder.buildRoadmap(missing, possessed)
        : emptyRoadmap();

    console.log(
      `[SkillGapAnalyzer] ${matchAnalysis.matchPercentage}% match, ` +
        `${missing.length} missing skill(s), ${learningRoadmap.steps.length} roadmap step(s)`
    );

    return {
      analysisId: uuid(),
      generatedAt: new Date().toISOString(),
      matchAnalysis,
      learningRoadmap,
    };
  }

  /**
   * Analyze raw extractor payloads. Throws a ZodError when either side is
   * not a list of mention objects.
   */
  async analyzeRaw(jobMentions: unknown, candidateMentions: unknown): Promise<SkillGapReport> {
    const job: SkillMention[] = parseMentions(jobMentions);
    const candidate: SkillMention[] = parseMentions(candidateMentions);
    return this.analyze({ jobMentions: job, candidateMentions: candidate });
  }
}
