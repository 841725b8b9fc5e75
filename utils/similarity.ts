import { FALLBACK_SIMILARITY, PLACEHOLDER_TOLERANCE } from '../config/scoringPolicy';

export type SimilarityFallbackReason =
  | 'missing_vector'
  | 'dimension_mismatch'
  | 'placeholder_vector'
  | 'zero_norm'
  | 'non_finite';

export interface SimilarityOutcome {
  similarity: number;
  fallback: SimilarityFallbackReason | null;
}

/**
 * A placeholder is what the embedding provider hands out when the encoder is
 * unavailable: every component equal and of low magnitude (e.g. 768 x 0.1).
 */
export function isPlaceholderEmbedding(vector: readonly number[] | null | undefined): boolean {
  if (!vector || vector.length === 0) return false;
  const first = vector[0];
  if (!Number.isFinite(first) || Math.abs(first) >= 1) return false;
  return vector.every(v => Math.abs(v - first) < PLACEHOLDER_TOLERANCE);
}

export function cosineSimilarity(vec1: readonly number[], vec2: readonly number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error(`Vector dimension mismatch: ${vec1.length} vs ${vec2.length}`);
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0;i < vec1.length;i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  const denominator = Math.sqrt(norm1) * Math.sqrt(norm2);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/**
 * `1 - cosine_distance` clamped to [0, 1], with the reason whenever the
 * neutral fallback was used instead.
 */
export function evaluateSimilarity(
  vecA: readonly number[] | null | undefined,
  vecB: readonly number[] | null | undefined
): SimilarityOutcome {
  if (!vecA || !vecB || vecA.length === 0 || vecB.length === 0) {
    return { similarity: FALLBACK_SIMILARITY, fallback: 'missing_vector' };
  }
  if (vecA.length !== vecB.length) {
    return { similarity: FALLBACK_SIMILARITY, fallback: 'dimension_mismatch' };
  }
  if (!vecA.every(Number.isFinite) || !vecB.every(Number.isFinite)) {
    return { similarity: FALLBACK_SIMILARITY, fallback: 'non_finite' };
  }
  const normA = vecA.reduce((sum, v) => sum + v * v, 0);
  const normB = vecB.reduce((sum, v) => sum + v * v, 0);
  if (normA === 0 || normB === 0) {
    return { similarity: FALLBACK_SIMILARITY, fallback: 'zero_norm' };
  }

  if (isPlaceholderEmbedding(vecA) || isPlaceholderEmbedding(vecB)) {
    return { similarity: FALLBACK_SIMILARITY, fallback: 'placeholder_vector' };
  }

  const similarity = cosineSimilarity(vecA, vecB);
  return { similarity: Math.max(0, Math.min(1, similarity)), fallback: null };
}

export function computeSimilarity(
  vecA: readonly number[] | null | undefined,
  vecB: readonly number[] | null | undefined
): number {
  const outcome = evaluateSimilarity(vecA, vecB);
  if (outcome.fallback) {
    console.warn(`[Similarity] Using fallback similarity ${FALLBACK_SIMILARITY} (${outcome.fallback})`);
  }
  return outcome.similarity;
}
