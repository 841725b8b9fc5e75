import {
  EXPERIENCE_RELATED_RATIO,
  GOOD_CANDIDATE_THRESHOLD,
  HIGHLY_RECOMMENDED_THRESHOLD
} from '../config/scoringPolicy';
import { MatchExplanation, Profile, SubScores } from '../types';
import { displayName } from '../utils/profile';
import { foldDiacritics } from '../utils/textNormalization';
import { EducationScoringService } from './EducationScoringService';
import { SkillMatchAnalysis, SkillMatchingService } from './SkillMatchingService';

export type RecommendationTier = 'highly_recommended' | 'good_candidate' | 'consider_alternatives';

const TIER_RECOMMENDATIONS: Record<RecommendationTier, string> = {
  highly_recommended: 'Highly recommended candidate',
  good_candidate: 'Good candidate with potential',
  consider_alternatives: 'Consider alternative candidates'
};

const TIER_NARRATIVES: Record<RecommendationTier, string> = {
  highly_recommended: 'Excellent candidate, highly recommended for this position.',
  good_candidate: 'Good candidate with potential; evaluate gaps and training possibilities.',
  consider_alternatives: 'Consider if the profile brings complementary value; otherwise explore other candidates.'
};

interface QuestionTopic {
  keywords: string[];
  answer: (candidate: Profile) => string | null;
}

// keywords are matched against the lowercased question with accents folded
const QUESTION_TOPICS: QuestionTopic[] = [
  {
    keywords: ['experience'],
    answer: candidate => `The candidate has ${formatYears(candidate.experienceYears)} years of experience.`
  },
  {
    keywords: ['skill', 'competence'],
    answer: candidate => {
      const skills = [...candidate.technicalSkills].slice(0, 5).map(token => displayName(candidate, token));
      return skills.length > 0 ? `Technical skills include: ${skills.join(', ')}` : null;
    }
  },
  {
    keywords: ['project', 'projet'],
    answer: () => 'Projects mentioned in the CV will be reviewed in detail.'
  },
  {
    keywords: ['availability', 'disponibilite'],
    answer: candidate => `Availability: ${candidate.availability || 'unknown'}`
  },
  {
    keywords: ['education', 'formation'],
    answer: candidate => `Education: ${candidate.educationText || 'N/A'}`
  }
];

export function tierFor(score01: number): RecommendationTier {
  if (score01 >= HIGHLY_RECOMMENDED_THRESHOLD) return 'highly_recommended';
  if (score01 >= GOOD_CANDIDATE_THRESHOLD) return 'good_candidate';
  return 'consider_alternatives';
}

/**
 * Unweighted mean of the sub-scores. Only drives the recommendation tier;
 * ranking uses the weighted overall score.
 */
export function coarseScore(scores: SubScores): number {
  const values = Object.values(scores);
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function formatYears(years: number): string {
  return Number.isInteger(years) ? String(years) : String(Math.round(years * 10) / 10);
}

export class ExplanationService {
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
   * Strengths, gaps and recommendations for one candidate/job pair.
   *
   * `overallScore` (0-100, weighted) only feeds the narrative; when it is
   * omitted the narrative falls back to the coarse mean.
   */
  explain(candidate: Profile, job: Profile, scores: SubScores, overallScore?: number): MatchExplanation {
    const strengths: string[] = [];
    const gaps: string[] = [];
    const recommendations: string[] = [];

    const skills = this.skillMatcher.analyze(candidate.technicalSkills, job.technicalSkills);
    const exact = new Set(skills.exactMatches);
    const synonyms = new Map(skills.synonymMatches.map(match => [match.jobSkill, match.candidateSkill]));

    for (const token of job.technicalSkills) {
      const name = displayName(job, token);
      const alias = synonyms.get(token);
      if (exact.has(token)) {
        strengths.push(`+ Has required skill: ${name}`);
      } else if (alias) {
        strengths.push(`+ Has equivalent skill: ${displayName(candidate, alias)} (for ${name})`);
      } else {
        gaps.push(`- Missing skill: ${name}`);
        recommendations.push(`Consider training in ${name}`);
      }
    }

    const candidateYears = candidate.experienceYears;
    const requiredYears = job.experienceYears;
    if (candidateYears >= requiredYears) {
      strengths.push(`+ Meets experience requirement: ${formatYears(candidateYears)} years`);
    } else {
      gaps.push(`- Experience gap: ${formatYears(candidateYears)} years (required: ${formatYears(requiredYears)})`);
      if (candidateYears >= requiredYears * EXPERIENCE_RELATED_RATIO) {
        recommendations.push('Candidate has sufficient related experience');
      }
    }

    const candidateLevel = this.educationScorer.inferLevel(candidate.educationText);
    const requiredLevel = this.educationScorer.inferLevel(job.educationText);
    if (requiredLevel > 0) {
      if (candidateLevel >= requiredLevel) {
        strengths.push('+ Meets education requirement');
      } else {
        gaps.push('- Education below requirement');
      }
    }

    const coarse = coarseScore(scores);
    recommendations.unshift(TIER_RECOMMENDATIONS[tierFor(coarse)]);

    const narrativePercent = typeof overallScore === 'number' && Number.isFinite(overallScore)
      ? overallScore
      : coarse * 100;

    return {
      strengths,
      gaps,
      recommendations,
      narrative: this.buildNarrative(candidate, job, skills, narrativePercent),
      coarseScore: coarse
    };
  }

  suggestInterviewQuestions(candidate: Profile, job: Profile): string[] {
    const questions: string[] = [];

    if (candidate.experienceYears > 0) {
      questions.push(`Tell us about your ${Math.floor(candidate.experienceYears)} years of experience.`);
    }

    const { missingSkills } = this.skillMatcher.analyze(candidate.technicalSkills, job.technicalSkills);
    for (const skill of missingSkills.slice(0, 2)) {
      questions.push(`What is your experience with ${displayName(job, skill)}?`);
    }

    questions.push('Can you walk us through a recent project you are proud of?');
    questions.push('What interests you about this position?');
    return questions;
  }

  /**
   * Keyword-routed answer about a candidate. Every topic the question
   * mentions contributes one line, in a fixed order.
   */
  answerQuestion(question: string, candidate: Profile): string {
    const normalized = foldDiacritics(question).toLowerCase();
    const answers: string[] = [];
    for (const topic of QUESTION_TOPICS) {
      if (!topic.keywords.some(keyword => normalized.includes(keyword))) continue;
      const answer = topic.answer(candidate);
      if (answer) answers.push(answer);
    }
    if (answers.length === 0) {
      answers.push('See the full CV for more information about this candidate.');
    }
    return answers.join('\n');
  }

  generateCandidateSummary(candidate: Profile, job: Profile): string {
    const lines: string[] = [];
    lines.push(`Executive summary - ${candidate.name || 'Candidate'}`, '');
    lines.push(`For the position: ${job.title || 'N/A'}`, '');
    lines.push('Strengths for this position:');
    for (const skill of this.matchedSkillNames(candidate, job).slice(0, 5)) {
      lines.push(`+ ${skill}`);
    }
    lines.push('');
    lines.push(`Experience: ${formatYears(candidate.experienceYears)} years`);
    if (candidate.currentPosition) {
      lines.push(`Current position: ${candidate.currentPosition}`);
    }
    return lines.join('\n');
  }

  /**
   * Outreach email for a candidate; `overallScore` is on the 0-100 scale.
   */
  generateEmailContent(candidate: Profile, job: Profile, overallScore: number): string {
    const lines: string[] = [];
    lines.push(`Hello ${candidate.name || 'Sir or Madam'},`, '');
    lines.push(`We have reviewed your profile and believe you may be interested in our ${job.title || 'open'} position.`, '');
    lines.push('Your profile is a strong fit for this role thanks to:');
    for (const skill of this.matchedSkillNames(candidate, job).slice(0, 3)) {
      lines.push(`- ${skill}`);
    }
    lines.push('');
    lines.push(`Compatibility score: ${Math.round(overallScore)}%`, '');
    lines.push('We would be glad to discuss the role with you.', '');
    lines.push('Best regards,');
    lines.push('The recruiting team');
    return lines.join('\n');
  }

  // exact matches first, then skills covered through an alias
  private matchedSkillNames(candidate: Profile, job: Profile): string[] {
    const skills = this.skillMatcher.analyze(candidate.technicalSkills, job.technicalSkills);
    return [
      ...skills.exactMatches.map(token => displayName(job, token)),
      ...skills.synonymMatches.map(({ jobSkill, candidateSkill }) =>
        `${displayName(job, jobSkill)} (as ${displayName(candidate, candidateSkill)})`)
    ];
  }

  private buildNarrative(
    candidate: Profile,
    job: Profile,
    skills: SkillMatchAnalysis,
    percent: number
  ): string {
    const lines: string[] = [];
    lines.push(`Compatibility score: ${Math.round(percent)}%`, '');
    lines.push('Detailed analysis:', '');

    lines.push('Technical skills:');
    for (const token of skills.exactMatches) {
      lines.push(`+ ${displayName(job, token)}`);
    }
    for (const { jobSkill, candidateSkill } of skills.synonymMatches) {
      lines.push(`+ ${displayName(job, jobSkill)} (as ${displayName(candidate, candidateSkill)})`);
    }
    for (const token of skills.missingSkills) {
      lines.push(`- ${displayName(job, token)} (missing skill)`);
    }
    lines.push('');

    lines.push('Experience:');
    const sign = candidate.experienceYears >= job.experienceYears ? '+' : '-';
    lines.push(`${sign} ${formatYears(candidate.experienceYears)} years experience (required: ${formatYears(job.experienceYears)})`);
    lines.push('');

    lines.push('Recommendation:');
    lines.push(TIER_NARRATIVES[tierFor(percent / 100)]);

    return lines.join('\n');
  }
}
