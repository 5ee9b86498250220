/**
 * Application Configuration
 *
 * Environment variables (loaded from .env by the entry point) parsed into
 * a typed config object. Relative paths resolve against the working
 * directory.
 */

import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_SKILL_TABLE_PATH } from '../../domain/skills/SkillTable.js';
import { DEFAULT_RESOURCE_CATALOG_PATH } from '../../domain/services/ResourceCatalog.js';

// =============================================================================
// TYPES
// =============================================================================

export interface AppConfig {
  skillTablePath: string;
  resourceCatalogPath: string;
  youtubeApiKey?: string;
  resourceLookupTimeoutMs: number;
  resourceMaxResults: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public code: 'INVALID_CONFIG',
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// SCHEMA
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const blankToUndefined = (value: unknown) => (typeof value === 'string' && !value.trim() ? undefined : value);

const envSchema = z.object({
  SKILL_TABLE_PATH: optionalString,
  RESOURCE_CATALOG_PATH: optionalString,
  YOUTUBE_API_KEY: optionalString,
  RESOURCE_LOOKUP_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5000)),
  RESOURCE_MAX_RESULTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(50).default(3)),
});

// =============================================================================
// LOADER
// =============================================================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', 'INVALID_CONFIG', {
      issues: parsed.error.issues.map((issue) => ({
        variable: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const values = parsed.data;

  return {
    skillTablePath: values.SKILL_TABLE_PATH ? path.resolve(values.SKILL_TABLE_PATH) : DEFAULT_SKILL_TABLE_PATH,
    resourceCatalogPath: values.RESOURCE_CATALOG_PATH
      ? path.resolve(values.RESOURCE_CATALOG_PATH)
      : DEFAULT_RESOURCE_CATALOG_PATH,
    youtubeApiKey: values.YOUTUBE_API_KEY,
    resourceLookupTimeoutMs: values.RESOURCE_LOOKUP_TIMEOUT_MS,
    resourceMaxResults: values.RESOURCE_MAX_RESULTS,
  };
}
