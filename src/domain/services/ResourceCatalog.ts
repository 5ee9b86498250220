/**
 * Resource Catalog - Hand-picked learning resources per canonical skill
 *
 * Consulted before any external lookup. A missing or unparseable catalog
 * file leaves the catalog empty; every skill then goes to the resolver.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { Resource } from '../entities/Roadmap.js';
import {
  curatedResourceSchema,
  resourceCatalogShapeSchema,
  resourceListSchema,
} from '../skills/schemas.js';

export const DEFAULT_RESOURCE_CATALOG_PATH = path.resolve(__dirname, '../../../data/resources.json');

export class ResourceCatalog {
  private entries: ReadonlyMap<string, readonly Resource[]>;

  constructor(entries: ReadonlyMap<string, readonly Resource[]> = new Map()) {
    this.entries = entries;
  }

  /**
   * Throws only when the document is not an object. A skill whose value is
   * not a list, and any resource that fails validation, is skipped with a
   * warning.
   */
  static fromDocument(input: unknown): ResourceCatalog {
    const document = resourceCatalogShapeSchema.parse(input);
    const entries = new Map<string, readonly Resource[]>();

    for (const [skill, value] of Object.entries(document)) {
      const list = resourceListSchema.safeParse(value);
      if (!list.success) {
        console.warn(`[ResourceCatalog] Skipping "${skill}": expected a list of resources`);
        continue;
      }

      const resources: Resource[] = [];
      list.data.forEach((item, index) => {
        const parsed = curatedResourceSchema.safeParse(item);
        if (!parsed.success) {
          console.warn(
            `[ResourceCatalog] Skipping resource ${index} of "${skill}":`,
            parsed.error.issues.map((issue) => issue.message).join('; ')
          );
          return;
        }
        const { title, url, kind } = parsed.data;
        resources.push(Object.freeze({ title, url, kind }));
      });

      entries.set(skill, Object.freeze(resources));
    }

    return new ResourceCatalog(entries);
  }

  static fromFile(filePath: string = DEFAULT_RESOURCE_CATALOG_PATH): ResourceCatalog {
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf8');
    } catch {
      console.warn(`[ResourceCatalog] ${filePath} not found. No curated resources will be used.`);
      return new ResourceCatalog();
    }

    try {
      return ResourceCatalog.fromDocument(JSON.parse(raw));
    } catch (error) {
      console.warn(
        `[ResourceCatalog] Could not parse ${filePath}. No curated resources will be used.`,
        error instanceof Error ? error.message : error
      );
      return new ResourceCatalog();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Curated resources for a skill; [] when the catalog has none.
   */
  get(skill: string): Resource[] {
    return [...(this.entries.get(skill) ?? [])];
  }
}
