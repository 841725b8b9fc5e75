import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { WeightsSchema } from './config';
import { EmbeddingService } from './services/EmbeddingService';
import { MatchingService } from './services/MatchingService';
import { buildProfile } from './utils/profile';
import { isPlaceholderEmbedding } from './utils/similarity';

const ProfileSchema = z.object({
  id: z.string().optional(),
  technicalSkills: z.array(z.string()).optional(),
  softSkills: z.array(z.string()).optional(),
  experienceYears: z.number().nonnegative().optional(),
  education: z.union([z.string(), z.array(z.string())]).optional(),
  embedding: z.array(z.number()).optional(),
  text: z.string().optional(),
  name: z.string().optional(),
  title: z.string().optional(),
  currentPosition: z.string().optional(),
  availability: z.string().optional()
});

const SubScoresSchema = z.object({
  technical_skills: z.number().min(0).max(1),
  experience: z.number().min(0).max(1),
  education: z.number().min(0).max(1),
  soft_skills: z.number().min(0).max(1)
});

const EmbedRequestSchema = z.object({ text: z.string() });

const SimilarityRequestSchema = z.object({
  a: z.array(z.number()),
  b: z.array(z.number())
});

const MatchRequestSchema = z.object({
  candidate: ProfileSchema,
  job: ProfileSchema,
  weights: WeightsSchema.optional()
});

const BatchMatchRequestSchema = z.object({
  job: ProfileSchema,
  candidates: z.array(ProfileSchema),
  weights: WeightsSchema.optional(),
  topK: z.number().int().positive().optional()
});

const ExplainRequestSchema = z.object({
  candidate: ProfileSchema,
  job: ProfileSchema,
  scores: SubScoresSchema.optional()
});

const AskRequestSchema = z.object({
  question: z.string().trim().min(1),
  candidate: ProfileSchema
});

const SummaryRequestSchema = z.object({
  candidate: ProfileSchema,
  job: ProfileSchema
});

const EmailRequestSchema = z.object({
  candidate: ProfileSchema,
  job: ProfileSchema,
  score: z.number().min(0).max(100).optional() // weighted overall score; computed when absent
});

const DiagnoseRequestSchema = z.object({ embedding: z.array(z.number()) });

export interface AppOptions {
  corsOrigins?: RegExp[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.infer<S> | undefined {
  const parsed = schema.safeParse(req.body);
  if (!parsed.success) {
    const message = describeIssues(parsed.error);
    console.warn(`[Server] ${req.method} ${req.path} rejected: ${message}`);
    res.status(400).json({
      error: 'Invalid request',
      message
    });
    return undefined;
  }
  return parsed.data;
}

function sendFailure(res: Response, label: string, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[Server] ERROR: ${label}:`, error);
  res.status(500).json({
    error: label,
    message
  });
}

export function createApp(
  matchingService: MatchingService,
  embeddingService: EmbeddingService,
  options: AppOptions = {}
): Express {
  const app = express();
  const allowedOrigins = options.corsOrigins ?? [/^http:\/\/localhost(:\d+)?$/];

  app.use(cors({
    origin: (origin, callback) => {
      // requests without an Origin header (curl, server-to-server)
      if (!origin) return callback(null, true);
      callback(null, allowedOrigins.some(pattern => pattern.test(origin)));
    },
    credentials: true
  }));
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      embedding: embeddingService.getStatus()
    });
  });

  app.post('/api/embed', async (req: Request, res: Response) => {
    const body = parseBody(EmbedRequestSchema, req, res);
    if (!body) return;
    try {
      const embedding = await embeddingService.embed(body.text);
      res.json({
        embedding,
        dimension: embedding.length,
        placeholder: isPlaceholderEmbedding(embedding)
      });
    } catch (error) {
      sendFailure(res, 'Embedding failed', error);
    }
  });

  app.post('/api/similarity', (req: Request, res: Response) => {
    const body = parseBody(SimilarityRequestSchema, req, res);
    if (!body) return;
    res.json({ similarity: matchingService.similarity(body.a, body.b) });
  });

  app.post('/api/match', async (req: Request, res: Response) => {
    const body = parseBody(MatchRequestSchema, req, res);
    if (!body) return;
    try {
      const result = await matchingService.match(body.candidate, body.job, body.weights);
      res.json(result);
    } catch (error) {
      sendFailure(res, 'Match failed', error);
    }
  });

  app.post('/api/match/batch', async (req: Request, res: Response) => {
    const body = parseBody(BatchMatchRequestSchema, req, res);
    if (!body) return;
    try {
      const { results, errors } = await matchingService.matchBatch(body.job, body.candidates, {
        weights: body.weights,
        topK: body.topK
      });
      res.json({
        count: results.length,
        results,
        errors
      });
    } catch (error) {
      sendFailure(res, 'Batch match failed', error);
    }
  });

  app.post('/api/explain', (req: Request, res: Response) => {
    const body = parseBody(ExplainRequestSchema, req, res);
    if (!body) return;
    try {
      const candidate = buildProfile(body.candidate, 'candidate');
      const job = buildProfile(body.job, 'job');
      const scores = body.scores ?? matchingService.detailedScores(candidate, job);
      const explanation = matchingService.explain(candidate, job, scores);
      res.json({
        ...explanation,
        scores,
        interviewQuestions: matchingService.suggestInterviewQuestions(candidate, job)
      });
    } catch (error) {
      sendFailure(res, 'Explanation failed', error);
    }
  });

  app.post('/api/ask', (req: Request, res: Response) => {
    const body = parseBody(AskRequestSchema, req, res);
    if (!body) return;
    try {
      const candidate = buildProfile(body.candidate, 'candidate');
      res.json({ answer: matchingService.answerQuestion(body.question, candidate) });
    } catch (error) {
      sendFailure(res, 'Question failed', error);
    }
  });

  app.post('/api/summary', (req: Request, res: Response) => {
    const body = parseBody(SummaryRequestSchema, req, res);
    if (!body) return;
    try {
      const candidate = buildProfile(body.candidate, 'candidate');
      const job = buildProfile(body.job, 'job');
      res.json({ summary: matchingService.candidateSummary(candidate, job) });
    } catch (error) {
      sendFailure(res, 'Summary failed', error);
    }
  });

  app.post('/api/email', async (req: Request, res: Response) => {
    const body = parseBody(EmailRequestSchema, req, res);
    if (!body) return;
    try {
      const score = body.score ?? (await matchingService.match(body.candidate, body.job)).overallScore;
      const candidate = buildProfile(body.candidate, 'candidate');
      const job = buildProfile(body.job, 'job');
      res.json({
        email: matchingService.emailContent(candidate, job, score),
        score
      });
    } catch (error) {
      sendFailure(res, 'Email generation failed', error);
    }
  });

  app.post('/api/embedding/diagnose', (req: Request, res: Response) => {
    const body = parseBody(DiagnoseRequestSchema, req, res);
    if (!body) return;
    res.json({
      dimension: body.embedding.length,
      placeholder: isPlaceholderEmbedding(body.embedding)
    });
  });

  // malformed JSON bodies surface here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({
        error: 'Invalid request',
        message: 'Request body is not valid JSON'
      });
      return;
    }
    sendFailure(res, 'Internal server error', error);
  });

  return app;
}
