import { PartialWeights, resolveWeights } from '../config';
import {
  EXPERIENCE_UNSPECIFIED_CREDIT,
  SOFT_SKILLS_UNSPECIFIED_CREDIT
} from '../config/scoringPolicy';
import { Profile, SubScores, WeightConfiguration } from '../types';
import { intersect, normalizeSkillSet } from '../utils/textNormalization';
import { EducationScoringService } from './EducationScoringService';
import { SkillMatchingService } from './SkillMatchingService';

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Ratio of candidate years to required years, capped at 1.
 * No requirement means full credit, unlike the skill and education scorers.
 */
export function scoreExperience(candidateYears: number, requiredYears: number): number {
  const required = nonNegative(requiredYears);
  if (required > 0) {
    return Math.min(nonNegative(candidateYears) / required, 1.0);
  }
  return EXPERIENCE_UNSPECIFIED_CREDIT;
}

export function scoreSoftSkills(candidateSoftSkills: Iterable<string>, requiredSoftSkills: Iterable<string>): number {
  const candidate = normalizeSkillSet(candidateSoftSkills);
  const required = normalizeSkillSet(requiredSoftSkills);

  if (required.size > 0) {
    return intersect(candidate, required).size / required.size;
  }
  return candidate.size > 0 ? SOFT_SKILLS_UNSPECIFIED_CREDIT : 0.0;
}

/**
 * Round to `decimals` places, ties to the even neighbour.
 */
export function roundHalfEven(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  // float noise: 12.500000000000002 is still a tie
  if (Math.abs(scaled - floor - 0.5) > 1e-9) {
    return Math.round(scaled) / factor;
  }
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

/**
 * Weighted sum of similarity and sub-scores on a 0-100 scale.
 * Components are clamped to [0, 1]; the sum is divided by the actual weight
 * total so partial or unnormalized weight sets stay comparable.
 */
export function combineScores(
  similarity: number,
  scores: SubScores,
  weights?: PartialWeights | WeightConfiguration
): number {
  const w = resolveWeights(weights);

  const weighted =
    w.similarity * clamp01(similarity) +
    w.technical * clamp01(scores.technical_skills) +
    w.experience * clamp01(scores.experience) +
    w.education * clamp01(scores.education) +
    w.soft_skills * clamp01(scores.soft_skills);

  const totalWeight = w.similarity + w.technical + w.experience + w.education + w.soft_skills || 1.0;
  return roundHalfEven((weighted / totalWeight) * 100, 2);
}

export class ScoringService {
  private skillMatcher: SkillMatchingService;
  private educationScorer: EducationScoringService;

  constructor(
    skillMatcher: SkillMatchingService = new SkillMatchingService(),
    educationScorer: EducationScoringService = new EducationScoringService()
  ) {
    this.skillMatcher = skillMatcher;
    this.educationScorer = educationScorer;
  }

  /**
   * All four sub-scores, each in [0, 1]. Missing attributes are valid input
   * and fall through to the partial-credit policies.
   */
  detailedScores(candidate: Profile, job: Profile): SubScores {
    return {
      technical_skills: clamp01(this.skillMatcher.score(candidate.technicalSkills, job.technicalSkills)),
      experience: clamp01(scoreExperience(candidate.experienceYears, job.experienceYears)),
      education: clamp01(this.educationScorer.score(candidate.educationText, job.educationText)),
      soft_skills: clamp01(scoreSoftSkills(candidate.softSkills, job.softSkills))
    };
  }

  overallScore(similarity: number, scores: SubScores, weights?: PartialWeights | WeightConfiguration): number {
    return combineScores(similarity, scores, weights);
  }
}
