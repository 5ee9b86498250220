/**
 * Domain Entities
 *
 * Plain data types shared by the normalizer, scorer and roadmap builder.
 */

// Skills and mentions
export * from './Skill.js';

// Match scoring
export * from './Score.js';

// Learning roadmaps
export * from './Roadmap.js';

// Full analysis reports
export * from './Analysis.js';
