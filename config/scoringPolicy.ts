import { WeightConfiguration } from '../types';

/**
 * Fixed scoring constants. Historical scores depend on these exact values,
 * including the different credit given when a requirement is not stated.
 */

// Embeddings / similarity
export const EMBEDDING_DIMENSION = 768;
export const PLACEHOLDER_EMBEDDING_VALUE = 0.1;
export const PLACEHOLDER_TOLERANCE = 1e-3;
export const FALLBACK_SIMILARITY = 0.75;

// Skills
export const SKILLS_UNSPECIFIED_CREDIT = 0.5;
export const EXACT_MATCH_WEIGHT = 1.0;
export const SYNONYM_MATCH_WEIGHT = 0.7;

// Experience: no requirement means full credit
export const EXPERIENCE_UNSPECIFIED_CREDIT = 1.0;
export const EXPERIENCE_RELATED_RATIO = 0.7;

// Soft skills
export const SOFT_SKILLS_UNSPECIFIED_CREDIT = 0.3;

// Education
export const EDUCATION_UNKNOWN_WITH_REQUIREMENT = 0.2;
export const EDUCATION_MEETS_BASE = 0.85;
export const EDUCATION_EXCESS_STEP = 0.1;
export const EDUCATION_EXCESS_CAP = 0.2;
export const EDUCATION_BELOW_FLOOR = 0.3;
export const EDUCATION_UNSPECIFIED_BASE = 0.6;
export const EDUCATION_UNSPECIFIED_DIVISOR = 5;
export const EDUCATION_UNSPECIFIED_UNKNOWN = 0.4;

// Recommendation tiers on the unweighted mean of sub-scores
export const HIGHLY_RECOMMENDED_THRESHOLD = 0.8;
export const GOOD_CANDIDATE_THRESHOLD = 0.6;

export const DEFAULT_WEIGHTS: Readonly<WeightConfiguration> = Object.freeze({
  similarity: 0.5,
  technical: 0.3,
  experience: 0.15,
  education: 0.05,
  soft_skills: 0.0,
});
