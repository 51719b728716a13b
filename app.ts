import express, { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import cors from 'cors';
import { AskResult, CallerIdentity } from './types';
import { DocumentQAService } from './services/DocumentQAService';
import { resolveCaller } from './utils/callerIdentity';
import { DocQAError, HTTP_STATUS, RateLimitedError, ValidationError, errorMessage } from './utils/errors';
import { normalizeTags } from './utils/validators';

export interface AppDependencies {
  /** Null when no language-model credentials are configured; Q&A routes then answer 503. */
  qaService: DocumentQAService | null;
  maxFileSize: number;
  corsOrigins: string[];
}

const LOCALHOST_ORIGIN = /^http:\/\/localhost(:\d+)?$/;

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof DocQAError) {
    if (error instanceof RateLimitedError) {
      res.set('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
    }
    console.warn(`[Server] ${context} rejected (${error.kind}): ${error.message}`);
    res.status(error.httpStatus).json({
      error: error.kind,
      message: error.message,
      ...(error instanceof ValidationError && error.details.length > 0 ? { details: error.details } : {})
    });
    return;
  }

  console.error(`[Server] ERROR: ${context} failed:`, error);
  res.status(500).json({
    error: 'internal',
    message: errorMessage(error)
  });
}

function askResultBody(result: AskResult) {
  if (result.status === 'error') {
    return { status: result.status, error: result.error.kind, message: result.error.message };
  }
  return { status: result.status, ...result.result };
}

function sendAskResult(res: Response, result: AskResult): void {
  if (result.status === 'error') {
    if (result.error.retryAfterMs !== undefined) {
      res.set('Retry-After', String(Math.ceil(result.error.retryAfterMs / 1000)));
    }
    res.status(HTTP_STATUS[result.error.kind]).json({ error: result.error.kind, message: result.error.message });
    return;
  }
  res.json(askResultBody(result));
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const { qaService } = deps;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: deps.maxFileSize
    }
  });

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or server-to-server calls)
      if (!origin) return callback(null, true);

      if (LOCALHOST_ORIGIN.test(origin) || deps.corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Resolves the service and caller or answers the request itself
  function prepare(req: Request, res: Response): { service: DocumentQAService; caller: CallerIdentity } | null {
    if (!qaService) {
      console.warn(`[Server] ${req.method} ${req.path} rejected: Q&A service not initialized`);
      res.status(503).json({
        error: 'service_unavailable',
        message: 'Document Q&A service is not initialized'
      });
      return null;
    }

    const caller = resolveCaller(req);
    if (!caller) {
      res.status(401).json({
        error: 'unauthenticated',
        message: 'Caller identity headers are missing'
      });
      return null;
    }
    return { service: qaService, caller };
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', qaAvailable: qaService !== null, timestamp: new Date().toISOString() });
  });

  app.post('/api/documents', (req: Request, res: Response, next: NextFunction) => {
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        res.status(400).json({
          error: 'validation',
          message: `Upload error: ${errorMessage(err)}`
        });
        return;
      }
      next();
    });
  }, async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const file = req.file;
      if (!file) {
        throw new ValidationError('No file uploaded', ['Please provide a document in the "file" field']);
      }

      const body: unknown = req.body;
      const fields: object = typeof body === 'object' && body !== null ? body : {};
      const tags = 'tags' in fields ? fields.tags : undefined;
      const documentId = 'documentId' in fields && typeof fields.documentId === 'string' && fields.documentId.trim()
        ? fields.documentId.trim()
        : undefined;

      const result = await ctx.service.submitDocument({
        bytes: file.buffer,
        filename: file.originalname,
        accessTags: tags === undefined ? (documentId === undefined ? [] : undefined) : normalizeTags(toTagList(tags)),
        documentId
      }, ctx.caller);

      res.status(result.reused ? 200 : 201).json({ success: true, ...result });
    } catch (error) {
      sendError(res, error, 'Document upload');
    }
  });

  app.get('/api/documents', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const documents = await ctx.service.listDocuments(ctx.caller);
      res.json({ success: true, documents });
    } catch (error) {
      sendError(res, error, 'Document listing');
    }
  });

  app.delete('/api/documents/:id', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      await ctx.service.deleteDocument(req.params.id, ctx.caller);
      res.json({ success: true, documentId: req.params.id });
    } catch (error) {
      sendError(res, error, 'Document deletion');
    }
  });

  app.put('/api/documents/:id/access', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || !('tags' in body)) {
        throw new ValidationError('Access tags are required');
      }
      const document = await ctx.service.updateDocumentAccess(req.params.id, body.tags, ctx.caller);
      res.json({ success: true, document });
    } catch (error) {
      sendError(res, error, 'Access update');
    }
  });

  app.post('/api/qa/ask', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const body: unknown = req.body;
      const fields: object = typeof body === 'object' && body !== null ? body : {};
      const question = 'question' in fields && typeof fields.question === 'string' ? fields.question : '';
      const documentId = 'documentId' in fields && typeof fields.documentId === 'string' ? fields.documentId : undefined;

      const result = await ctx.service.ask({ question, caller: ctx.caller, documentId });
      sendAskResult(res, result);
    } catch (error) {
      sendError(res, error, 'Question');
    }
  });

  app.post('/api/qa/batch', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const body: unknown = req.body;
      const questions = typeof body === 'object' && body !== null && 'questions' in body ? body.questions : undefined;

      const results = await ctx.service.askBatch(questions, ctx.caller);
      res.json({
        responses: results.map(askResultBody),
        totalQuestions: results.length,
        successfulAnswers: results.filter(result => result.status === 'ok').length
      });
    } catch (error) {
      sendError(res, error, 'Batch question');
    }
  });

  app.get('/api/qa/suggestions', (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const topic = req.query.context;
      const suggestions = ctx.service.getSuggestedQuestions(ctx.caller, topic);
      res.json({ suggestions, context: typeof topic === 'string' ? topic : '' });
    } catch (error) {
      sendError(res, error, 'Suggestions');
    }
  });

  app.get('/api/stats', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const stats = await ctx.service.getStats(ctx.caller);
      res.json({ success: true, stats });
    } catch (error) {
      sendError(res, error, 'Stats');
    }
  });

  app.post('/api/index/clear', async (req: Request, res: Response) => {
    try {
      const ctx = prepare(req, res);
      if (!ctx) return;

      const result = await ctx.service.clearIndex(ctx.caller);
      res.json({ success: true, ...result });
    } catch (error) {
      sendError(res, error, 'Index clear');
    }
  });

  return app;
}

// multipart fields arrive as a comma-separated string, JSON bodies as an array
function toTagList(tags: unknown): unknown {
  if (typeof tags === 'string' && tags.trim().startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(tags);
      return parsed;
    } catch {
      throw new ValidationError('Access tags must be a list of strings');
    }
  }
  return tags;
}
