/**
 * Roadmap Builder - Ordered, time-estimated learning plan
 *
 * Three steps:
 * 1. Prerequisite closure: pull in every prerequisite the candidate lacks
 * 2. Ordering: round-based topological sort over the closure. A round
 *    that places nothing means a cycle; the rest is appended unordered and
 *    the roadmap is marked `ordering: 'fallback'`
 * 3. Enrichment: durations, running week totals, learning resources
 *
 * Steps 1 and 2 are pure (`planOrder`). Only resource lookups do I/O; they
 * run concurrently and each one is bounded by a timeout.
 */

import type { SkillLookup } from '../entities/Skill.js';
import type { LearningOrder, Resource, Roadmap, RoadmapStep } from '../entities/Roadmap.js';
import { getSkillTable, type SkillTable } from '../skills/SkillTable.js';
import { ResourceCatalog } from './ResourceCatalog.js';
import {
  lookupWithTimeout,
  NullResourceResolver,
  type ResourceResolver,
} from '../../integrations/resources/ResourceResolver.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface RoadmapBuilderConfig {
  maxResourcesPerSkill: number;
  resourceTimeoutMs: number;
  extraRounds: number; // Slack on top of |closure| before giving up on ordering
}

const DEFAULT_CONFIG: RoadmapBuilderConfig = {
  maxResourcesPerSkill: 3,
  resourceTimeoutMs: 5000,
  extraRounds: 5,
};

export interface RoadmapBuilderDeps {
  table?: SkillTable;
  catalog?: ResourceCatalog;
  resolver?: ResourceResolver;
}

// =============================================================================
// ROADMAP BUILDER
// =============================================================================

export class RoadmapBuilder {
  private config: RoadmapBuilderConfig;
  private table: SkillTable;
  private catalog: ResourceCatalog;
  private resolver: ResourceResolver;

  constructor(config: Partial<RoadmapBuilderConfig> = {}, deps: RoadmapBuilderDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.table = deps.table || getSkillTable();
    this.catalog = deps.catalog || new ResourceCatalog();
    this.resolver = deps.resolver || new NullResourceResolver();
  }

  /**
   * Missing skills plus every transitive prerequisite not already possessed,
   * in discovery order.
   */
  closure(missing: Iterable<string>, possessed: SkillLookup): string[] {
    const working = new Set(missing);
    const queue = [...working];

    for (let i = 0; i < queue.length; i++) {
      for (const prerequisite of this.table.getPrerequisites(queue[i])) {
        if (possessed.has(prerequisite) || working.has(prerequisite)) continue;
        working.add(prerequisite);
        queue.push(prerequisite);
      }
    }

    return queue;
  }

  /**
   * Dependency-respecting learning order for the closure of `missing`.
   */
  planOrder(missing: Iterable<string>, possessed: SkillLookup): LearningOrder {
    let remaining = this.closure(missing, possessed);
    const placed = new Set<string>();
    const skills: string[] = [];

    const maxRounds = remaining.length + this.config.extraRounds;
    let rounds = 0;

    while (remaining.length > 0 && rounds < maxRounds) {
      rounds++;
      const blocked: string[] = [];

      for (const skill of remaining) {
        const ready = this.table
          .getPrerequisites(skill)
          .every((prerequisite) => possessed.has(prerequisite) || placed.has(prerequisite));

        if (ready) {
          placed.add(skill);
          skills.push(skill);
        } else {
          blocked.push(skill);
        }
      }

      if (blocked.length === remaining.length) break;
      remaining = blocked;
    }

    if (remaining.length === 0) {
      return { skills, ordering: 'topological', unorderedSkills: [], rounds };
    }

    console.warn(
      `[RoadmapBuilder] Could not order ${remaining.length} skill(s) by prerequisites ` +
        `(dependency cycle or round limit): ${remaining.join(', ')}. Appending them unordered.`
    );

    return {
      skills: [...skills, ...remaining],
      ordering: 'fallback',
      unorderedSkills: [...remaining],
      rounds,
    };
  }

  /**
   * Full roadmap: planned order, durations, cumulative weeks and resources.
   * Never rejects because of a resource lookup.
   */
  async buildRoadmap(missing: Iterable<string>, possessed: SkillLookup): Promise<Roadmap> {
    const order = this.planOrder(missing, possessed);

    // Lookups may finish in any order; steps follow the planned order
    const resources = await Promise.all(order.skills.map((skill) => this.resolveResources(skill)));

    let cumulativeWeeks = 0;
    const steps: RoadmapStep[] = order.skills.map((skill, index) => {
      const timeline = this.table.getTimeline(skill);
      cumulativeWeeks += timeline.durationWeeks;

      return {
        order: index + 1,
        skill,
        durationWeeks: timeline.durationWeeks,
        difficulty: timeline.difficulty,
        cumulativeWeeks,
        resources: resources[index],
      };
    });

    return {
      steps,
      totalWeeks: cumulativeWeeks,
      ordering: order.ordering,
      unorderedSkills: order.unorderedSkills,
    };
  }

  /**
   * Curated catalog first, then the external resolver. Failures and
   * timeouts give an empty list for this skill only.
   */
  async resolveResources(skill: string): Promise<Resource[]> {
    const curated = this.catalog.get(skill);
    if (curated.length > 0) return curated;

    try {
      const links = await lookupWithTimeout(
        this.resolver,
        skill,
        this.config.maxResourcesPerSkill,
        this.config.resourceTimeoutMs
      );
      return links.map((link): Resource => ({ title: link.title, url: link.url, kind: 'external' }));
    } catch (error) {
      console.warn(
        `[RoadmapBuilder] Resource lookup failed for "${skill}":`,
        error instanceof Error ? error.message : error
      );
      return [];
    }
  }
}
