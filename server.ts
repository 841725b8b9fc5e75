import { createApp } from './app';
import { loadConfig } from './config';
import { EmbeddingService } from './services/EmbeddingService';
import { MatchingService } from './services/MatchingService';

const config = loadConfig();

if (!config.geminiApiKey) {
  console.error('[Server] WARNING: GEMINI_API_KEY environment variable is not set, similarity will use the fallback value');
}

const embeddingService = new EmbeddingService({
  apiKey: config.geminiApiKey,
  model: config.embeddingModel,
  dimension: config.embeddingDimension,
  maxConcurrent: config.embeddingMaxConcurrent,
  cacheSize: config.embeddingCacheSize
});

const matchingService = new MatchingService(embeddingService, {
  weights: config.weights,
  maxConcurrent: config.matchMaxConcurrent
});

const app = createApp(matchingService, embeddingService, { corsOrigins: config.corsOrigins });

const server = app.listen(config.port, () => {
  console.log(`[Server] Server started on port ${config.port}`);
  console.log(`[Server] Health check available at http://localhost:${config.port}/health`);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
