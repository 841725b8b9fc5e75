import dotenv from 'dotenv';
import { z } from 'zod';
import { WeightConfiguration, WeightKey } from '../types';
import { DEFAULT_WEIGHTS, EMBEDDING_DIMENSION } from './scoringPolicy';

dotenv.config();

export const WEIGHT_KEYS: readonly WeightKey[] = ['similarity', 'technical', 'experience', 'education', 'soft_skills'];

export const WeightsSchema = z
  .object({
    similarity: z.number().nonnegative(),
    technical: z.number().nonnegative(),
    experience: z.number().nonnegative(),
    education: z.number().nonnegative(),
    soft_skills: z.number().nonnegative(),
  })
  .partial()
  .strict();

export type PartialWeights = z.infer<typeof WeightsSchema>;

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5003),
  GEMINI_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(EMBEDDING_DIMENSION),
  EMBEDDING_MAX_CONCURRENT: z.coerce.number().int().positive().default(30),
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().nonnegative().default(1000),
  MATCH_MAX_CONCURRENT: z.coerce.number().int().positive().default(10),
  MATCHING_WEIGHTS: z.string().optional(),
  CORS_ORIGINS: z.string().default('^http://localhost(:\\d+)?$'),
});

export interface AppConfig {
  port: number;
  geminiApiKey?: string;
  embeddingModel: string;
  embeddingDimension: number;
  embeddingMaxConcurrent: number;
  embeddingCacheSize: number;
  matchMaxConcurrent: number;
  weights: WeightConfiguration;
  corsOrigins: RegExp[];
}

/**
 * Merge a partial weight configuration over `base`. Non-finite values are
 * ignored and negative ones floor at 0.
 */
export function mergeWeights(base: WeightConfiguration, weights?: PartialWeights): WeightConfiguration {
  const merged: WeightConfiguration = { ...base };
  if (!weights) {
    return merged;
  }
  for (const key of WEIGHT_KEYS) {
    const value = weights[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      merged[key] = Math.max(0, value);
    }
  }
  return merged;
}

export function resolveWeights(weights?: PartialWeights): WeightConfiguration {
  return mergeWeights(DEFAULT_WEIGHTS, weights);
}

export function parseWeights(raw: string | undefined): WeightConfiguration {
  if (!raw || !raw.trim()) {
    return resolveWeights();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`MATCHING_WEIGHTS is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  const parsed = WeightsSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`MATCHING_WEIGHTS is invalid: ${parsed.error.issues.map(issue => issue.message).join(', ')}`);
  }
  return resolveWeights(parsed.data);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    console.error('[Config] Invalid environment configuration:', parsed.error.format());
    throw new Error('Invalid environment configuration');
  }
  const data = parsed.data;
  const apiKey = data.GEMINI_API_KEY?.trim();

  return {
    port: data.PORT,
    geminiApiKey: apiKey ? apiKey : undefined,
    embeddingModel: data.EMBEDDING_MODEL,
    embeddingDimension: data.EMBEDDING_DIMENSION,
    embeddingMaxConcurrent: data.EMBEDDING_MAX_CONCURRENT,
    embeddingCacheSize: data.EMBEDDING_CACHE_SIZE,
    matchMaxConcurrent: data.MATCH_MAX_CONCURRENT,
    weights: parseWeights(data.MATCHING_WEIGHTS),
    corsOrigins: data.CORS_ORIGINS
      .split(',')
      .map(source => source.trim())
      .filter(source => source.length > 0)
      .map(source => new RegExp(source)),
  };
}
