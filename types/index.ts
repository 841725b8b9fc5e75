export type SubScoreKey = 'technical_skills' | 'experience' | 'education' | 'soft_skills';

export type SubScores = Record<SubScoreKey, number>;

export type WeightKey = 'similarity' | 'technical' | 'experience' | 'education' | 'soft_skills';

export type WeightConfiguration = Record<WeightKey, number>;

/**
 * Loose attribute bag handed over by the extraction layer or an API client.
 * Every key is optional; `buildProfile` fills the gaps.
 */
export interface ProfileInput {
  id?: string;
  technicalSkills?: string[];
  softSkills?: string[];
  experienceYears?: number;
  education?: string | string[]; // one entry or several, e.g. ["Master in CS", "Bac S"]
  embedding?: number[];
  text?: string; // CV text or job description + requirements, used when embedding is missing
  name?: string; // candidate full name
  title?: string; // job title
  currentPosition?: string;
  availability?: string;
}

/**
 * Unified candidate/job shape used by every scorer.
 * `embedding` is empty when absent.
 */
export interface Profile {
  id: string;
  technicalSkills: Set<string>;
  softSkills: Set<string>;
  experienceYears: number;
  educationText: string;
  embedding: number[];
  text: string;
  name: string;
  title: string;
  currentPosition: string;
  availability: string;
  // original spellings in input order, keyed by normalized token
  displayNames: Map<string, string>;
}

export interface MatchExplanation {
  strengths: string[];
  gaps: string[];
  recommendations: string[];
  narrative: string;
  coarseScore: number; // unweighted mean of the sub-scores, 0-1
}

export interface MatchResult {
  candidateId: string;
  jobId: string;
  similarity: number;
  similarityFallback: boolean;
  scores: SubScores;
  overallScore: number; // 0-100
  explanation: MatchExplanation;
}

export interface BatchMatchError {
  candidateId: string;
  message: string;
}

export interface BatchMatchResult {
  results: MatchResult[];
  errors: BatchMatchError[];
}
