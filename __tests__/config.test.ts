import { loadConfig, mergeWeights, parseWeights, resolveWeights } from '../config';
import { DEFAULT_WEIGHTS } from '../config/scoringPolicy';

describe('config', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resolveWeights', () => {
    it('should return the defaults without overrides', () => {
      expect(resolveWeights()).toEqual(DEFAULT_WEIGHTS);
    });

    it('should merge a partial configuration over the defaults', () => {
      expect(resolveWeights({ technical: 0.6 })).toEqual({ ...DEFAULT_WEIGHTS, technical: 0.6 });
    });
  });

  describe('mergeWeights', () => {
    const base = { similarity: 0.4, technical: 0.4, experience: 0.1, education: 0.1, soft_skills: 0 };

    it('should merge over the given base instead of the defaults', () => {
      expect(mergeWeights(base, { soft_skills: 0.2 })).toEqual({ ...base, soft_skills: 0.2 });
    });

    it('should floor negative values and ignore non-finite ones', () => {
      expect(mergeWeights(base, { technical: -1, education: Number.NaN })).toEqual({ ...base, technical: 0 });
    });

    it('should not mutate the base', () => {
      mergeWeights(base, { similarity: 1 });
      expect(base.similarity).toBe(0.4);
    });
  });

  describe('parseWeights', () => {
    it('should fall back to the defaults for an empty value', () => {
      expect(parseWeights(undefined)).toEqual(DEFAULT_WEIGHTS);
      expect(parseWeights('  ')).toEqual(DEFAULT_WEIGHTS);
    });

    it('should parse a partial JSON configuration', () => {
      expect(parseWeights('{"similarity": 0.7}')).toEqual({ ...DEFAULT_WEIGHTS, similarity: 0.7 });
    });

    it('should reject malformed JSON', () => {
      expect(() => parseWeights('{similarity')).toThrow(/^MATCHING_WEIGHTS is not valid JSON/);
    });

    it('should reject negative weights and unknown keys', () => {
      expect(() => parseWeights('{"similarity": -1}')).toThrow(/^MATCHING_WEIGHTS is invalid/);
      expect(() => parseWeights('{"salary": 1}')).toThrow(/^MATCHING_WEIGHTS is invalid/);
    });
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const config = loadConfig({});

      expect(config.port).toBe(5003);
      expect(config.geminiApiKey).toBeUndefined();
      expect(config.embeddingModel).toBe('text-embedding-004');
      expect(config.embeddingDimension).toBe(768);
      expect(config.embeddingMaxConcurrent).toBe(30);
      expect(config.embeddingCacheSize).toBe(1000);
      expect(config.matchMaxConcurrent).toBe(10);
      expect(config.weights).toEqual(DEFAULT_WEIGHTS);
      expect(config.corsOrigins).toHaveLength(1);
      expect(config.corsOrigins[0].test('http://localhost:3000')).toBe(true);
    });

    it('should read values from the environment', () => {
      const config = loadConfig({
        PORT: '8080',
        GEMINI_API_KEY: 'test-secret',
        MATCHING_WEIGHTS: '{"soft_skills": 0.1}',
        CORS_ORIGINS: '^https://jobs\\.example\\.com$, ^http://localhost:\\d+$'
      });

      expect(config.port).toBe(8080);
      expect(config.geminiApiKey).toBe('test-secret');
      expect(config.weights.soft_skills).toBe(0.1);
      expect(config.corsOrigins).toHaveLength(2);
      expect(config.corsOrigins[0].test('https://jobs.example.com')).toBe(true);
      expect(config.corsOrigins[0].test('https://jobsXexample.com')).toBe(false);
    });

    it('should treat a blank api key as missing', () => {
      expect(loadConfig({ GEMINI_API_KEY: '   ' }).geminiApiKey).toBeUndefined();
    });

    it('should reject an invalid port', () => {
      jest.spyOn(console, 'error').mockImplementation(() => {});
      expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow('Invalid environment configuration');
    });
  });
});
