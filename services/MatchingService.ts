import { mergeWeights, PartialWeights, resolveWeights } from '../config';
import { FALLBACK_SIMILARITY } from '../config/scoringPolicy';
import {
  BatchMatchError,
  BatchMatchResult,
  MatchExplanation,
  MatchResult,
  Profile,
  ProfileInput,
  SubScores,
  WeightConfiguration
} from '../types';
import { buildProfile } from '../utils/profile';
import { computeSimilarity, evaluateSimilarity } from '../utils/similarity';
import { EducationScoringService } from './EducationScoringService';
import { EmbeddingService } from './EmbeddingService';
import { ExplanationService } from './ExplanationService';
import { ScoringService } from './ScoringService';
import { SkillMatchingService } from './SkillMatchingService';

export interface MatchingServiceOptions {
  scoringService?: ScoringService;
  explanationService?: ExplanationService;
  weights?: WeightConfiguration;
  maxConcurrent?: number;
}

export interface BatchMatchOptions {
  weights?: PartialWeights;
  topK?: number;
}

export class MatchingService {
  private embeddingService: EmbeddingService;
  private scoringService: ScoringService;
  private explanationService: ExplanationService;
  private defaultWeights: WeightConfiguration;
  private maxConcurrent: number;

  constructor(embeddingService: EmbeddingService, options: MatchingServiceOptions = {}) {
    this.embeddingService = embeddingService;

    const skillMatcher = new SkillMatchingService();
    const educationScorer = new EducationScoringService();
    this.scoringService = options.scoringService ?? new ScoringService(skillMatcher, educationScorer);
    this.explanationService = options.explanationService ?? new ExplanationService(skillMatcher, educationScorer);
    this.defaultWeights = options.weights ?? resolveWeights();
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 10);
  }

  similarity(vecA: readonly number[], vecB: readonly number[]): number {
    return computeSimilarity(vecA, vecB);
  }

  detailedScores(candidate: Profile, job: Profile): SubScores {
    return this.scoringService.detailedScores(candidate, job);
  }

  explain(candidate: Profile, job: Profile, scores: SubScores, overallScore?: number): MatchExplanation {
    return this.explanationService.explain(candidate, job, scores, overallScore);
  }

  suggestInterviewQuestions(candidate: Profile, job: Profile): string[] {
    return this.explanationService.suggestInterviewQuestions(candidate, job);
  }

  answerQuestion(question: string, candidate: Profile): string {
    return this.explanationService.answerQuestion(question, candidate);
  }

  candidateSummary(candidate: Profile, job: Profile): string {
    return this.explanationService.generateCandidateSummary(candidate, job);
  }

  emailContent(candidate: Profile, job: Profile, overallScore: number): string {
    return this.explanationService.generateEmailContent(candidate, job, overallScore);
  }

  /**
   * Score one candidate against one job.
   *
   * Profiles without an embedding are embedded from their text; when there is
   * no text either, similarity falls back to the neutral constant.
   */
  async match(candidateInput: ProfileInput, jobInput: ProfileInput, weights?: PartialWeights): Promise<MatchResult> {
    const candidate = buildProfile(candidateInput, 'candidate');
    const job = buildProfile(jobInput, 'job');
    const jobEmbedding = await this.ensureEmbedding(job);

    const result = await this.scorePair(candidate, job, jobEmbedding, mergeWeights(this.defaultWeights, weights));
    console.log(`[MatchingService] Match ${candidate.id} -> ${job.id}: ${result.overallScore}% (similarity: ${result.similarity.toFixed(4)})`);
    return result;
  }

  /**
   * One job against many candidates. The job vector is computed once; each
   * pair is scored independently so one failure never aborts the batch.
   */
  async matchBatch(
    jobInput: ProfileInput,
    candidateInputs: ProfileInput[],
    options: BatchMatchOptions = {}
  ): Promise<BatchMatchResult> {
    const job = buildProfile(jobInput, 'job');
    const weights = mergeWeights(this.defaultWeights, options.weights);
    const jobEmbedding = await this.ensureEmbedding(job);

    console.log(`[MatchingService] Starting batch match - Job: ${job.id}, candidates: ${candidateInputs.length}`);

    const results: MatchResult[] = [];
    const errors: BatchMatchError[] = [];

    for (let i = 0;i < candidateInputs.length;i += this.maxConcurrent) {
      const chunk = candidateInputs.slice(i, i + this.maxConcurrent);
      await Promise.all(chunk.map(async (input, chunkIdx) => {
        const candidateId = input.id ?? `candidate-${i + chunkIdx}`;
        try {
          const candidate = buildProfile(input, candidateId);
          results.push(await this.scorePair(candidate, job, jobEmbedding, weights));
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          console.error(`[MatchingService] ERROR: Matching candidate ${candidateId} failed:`, message);
          errors.push({ candidateId, message });
        }
      }));
    }

    results.sort((a, b) => b.overallScore - a.overallScore || a.candidateId.localeCompare(b.candidateId));
    const topK = options.topK && options.topK > 0 ? Math.floor(options.topK) : results.length;

    console.log(`[MatchingService] Batch match completed: ${results.length} scored, ${errors.length} failed`);

    return {
      results: results.slice(0, topK),
      errors
    };
  }

  private async scorePair(
    candidate: Profile,
    job: Profile,
    jobEmbedding: number[],
    weights: WeightConfiguration
  ): Promise<MatchResult> {
    const candidateEmbedding = await this.ensureEmbedding(candidate);
    const outcome = evaluateSimilarity(candidateEmbedding, jobEmbedding);
    if (outcome.fallback) {
      console.warn(`[MatchingService] Similarity fallback ${FALLBACK_SIMILARITY} for ${candidate.id} -> ${job.id} (${outcome.fallback})`);
    }

    const scores = this.scoringService.detailedScores(candidate, job);
    const overallScore = this.scoringService.overallScore(outcome.similarity, scores, weights);
    const explanation = this.explanationService.explain(candidate, job, scores, overallScore);

    return {
      candidateId: candidate.id,
      jobId: job.id,
      similarity: outcome.similarity,
      similarityFallback: outcome.fallback !== null,
      scores,
      overallScore,
      explanation
    };
  }

  private async ensureEmbedding(profile: Profile): Promise<number[]> {
    if (profile.embedding.length > 0) {
      return profile.embedding;
    }
    if (!profile.text) {
      return [];
    }
    profile.embedding = await this.embeddingService.embed(profile.text);
    return profile.embedding;
  }
}
