/**
 * Canonical skill vocabulary and boundary schemas
 */

export {
  SkillTable,
  SkillTableError,
  getSkillTable,
  loadSkillTable,
  resetSkillTable,
  DEFAULT_SKILL_TABLE_PATH,
  type SkillTableErrorCode,
  type SkillTableDocument,
} from './SkillTable.js';

export {
  parseMentions,
  skillTableDocumentSchema,
  resourceCatalogSchema,
  type ResourceCatalogDocument,
} from './schemas.js';
