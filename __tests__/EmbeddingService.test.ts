import { EmbeddingModel, EmbeddingService } from '../services/EmbeddingService';

type EmbedResponse = Awaited<ReturnType<EmbeddingModel['embedContent']>>;

function response(values: number[]): EmbedResponse {
  return { embedding: { values } };
}

describe('EmbeddingService', () => {
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('degraded mode', () => {
    it('should return placeholder vectors when no model is available', async () => {
      const service = new EmbeddingService({ embeddingModel: null, dimension: 4 });

      await expect(service.embed('Senior backend engineer')).resolves.toEqual([0.1, 0.1, 0.1, 0.1]);
      await expect(service.embed('Another text')).resolves.toEqual([0.1, 0.1, 0.1, 0.1]);
      expect(service.getStatus()).toEqual({ mode: 'degraded', model: 'text-embedding-004', dimension: 4 });
    });

    it('should warn only once per instance', async () => {
      const service = new EmbeddingService({ embeddingModel: null, dimension: 4 });
      await service.embed('first');
      await service.embed('second');

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith(
        '[EmbeddingService] Degraded mode (no embedding model available): returning placeholder vectors of 4 x 0.1'
      );
    });

    it('should be degraded without an api key', () => {
      const service = new EmbeddingService();
      expect(service.getStatus().mode).toBe('degraded');
      expect(service.getDimension()).toBe(768);
    });
  });

  describe('embed', () => {
    it('should return the model vector', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([1, 2, 3]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 3 });

      await expect(service.embed('text')).resolves.toEqual([1, 2, 3]);
      expect(service.getStatus().mode).toBe('ready');
      expect(embedContent).toHaveBeenCalledWith('text');
    });

    it('should zero-pad short vectors to the configured dimension', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([1, 2]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 4 });

      await expect(service.embed('text')).resolves.toEqual([1, 2, 0, 0]);
      expect(warnSpy).toHaveBeenCalledWith('[EmbeddingService] Dimension mismatch: 4 vs 2');
    });

    it('should truncate long vectors to the configured dimension', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([1, 2, 3]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2 });

      await expect(service.embed('text')).resolves.toEqual([1, 2]);
    });

    it('should cache by text and hand out copies', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([1, 0]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2 });

      const first = await service.embed('same text');
      first[0] = 42;
      const second = await service.embed('same text');

      expect(second).toEqual([1, 0]);
      expect(embedContent).toHaveBeenCalledTimes(1);
    });

    it('should not share a cached vector between texts with a common prefix', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>()
        .mockImplementation(async (text: string) => response(text.endsWith('backend') ? [1, 0] : [0, 1]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2 });
      const intro = 'About us. '.repeat(100);

      const backend = await service.embed(`${intro}We are hiring backend`);
      const design = await service.embed(`${intro}We are hiring a designer`);

      expect(embedContent).toHaveBeenCalledTimes(2);
      expect(backend).toEqual([1, 0]);
      expect(design).toEqual([0, 1]);
    });

    it('should not cache when the cache size is 0', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([1, 0]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2, cacheSize: 0 });

      await service.embed('same text');
      await service.embed('same text');

      expect(embedContent).toHaveBeenCalledTimes(2);
    });

    it('should retry network errors and return the eventual vector', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>()
        .mockRejectedValueOnce(new Error('fetch failed'))
        .mockResolvedValueOnce(response([0, 1]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2, initialRetryDelayMs: 0 });

      await expect(service.embed('text')).resolves.toEqual([0, 1]);
      expect(embedContent).toHaveBeenCalledTimes(2);
    });

    it('should fall back to the placeholder after exhausting retries', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockRejectedValue(new Error('read ECONNRESET'));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2, initialRetryDelayMs: 0 });

      await expect(service.embed('text')).resolves.toEqual([0.1, 0.1]);
      expect(embedContent).toHaveBeenCalledTimes(4);
      expect(errorSpy).toHaveBeenCalledWith(
        '[EmbeddingService] ERROR: Falling back to placeholder embedding:',
        'Failed to generate embedding after 3 retries: read ECONNRESET'
      );
    });

    it('should not retry other errors', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockRejectedValue(new Error('API key not valid'));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2, initialRetryDelayMs: 0 });

      await expect(service.embed('text')).resolves.toEqual([0.1, 0.1]);
      expect(embedContent).toHaveBeenCalledTimes(1);
    });

    it('should fall back to the placeholder on a malformed response', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>().mockResolvedValue(response([]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2 });

      await expect(service.embed('text')).resolves.toEqual([0.1, 0.1]);
      expect(errorSpy).toHaveBeenCalledWith(
        '[EmbeddingService] ERROR: Falling back to placeholder embedding:',
        'Failed to generate embedding after 0 retries: Unexpected embedding response format'
      );
    });
  });

  describe('embedTexts', () => {
    it('should keep input order across chunks', async () => {
      const embedContent = jest.fn<Promise<EmbedResponse>, [string]>()
        .mockImplementation(async (text: string) => response([text.length, 0]));
      const service = new EmbeddingService({ embeddingModel: { embedContent }, dimension: 2, maxConcurrent: 2 });

      const embeddings = await service.embedTexts(['a', 'bb', 'ccc']);

      expect(embeddings).toEqual([[1, 0], [2, 0], [3, 0]]);
    });
  });
});
