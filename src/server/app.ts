/**
 * Express API server for SheetQA
 * Upload a spreadsheet, then ask questions about its rows within the returned session
 */

import express, { ErrorRequestHandler, Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { AppConfig, loadConfig } from '../config/config.js';
import { SpreadsheetProcessor } from '../file-processing/spreadsheet-processor.js';
import { allColumnNames } from '../normalize/normalizer.js';
import { SessionStore } from '../session/session-store.js';
import { SheetQA } from '../SheetQA.js';
import { AppError, errorMessage, UploadFormatError } from '../utils/errors.js';
import { apiLogger, logger, queryLogger } from '../utils/logger.js';

export interface AppDependencies {
  config: AppConfig;
  sessions: SessionStore;
  qa?: SheetQA;
  processor?: SpreadsheetProcessor;
}

// Request validation schemas
const AskRequestSchema = z.object({
  session_id: z.string().min(1),
  question: z.string().trim().min(1).max(1000),
  explain: z.boolean().optional().default(false),
});

const UploadFieldsSchema = z.object({
  sheet: z.string().trim().min(1).optional(),
});

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function errorHandler(config: AppConfig): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      apiLogger.warn(`${req.method} ${req.path} failed: ${error.message}`, { code: error.code });
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }

    if (error instanceof z.ZodError) {
      res.status(400).json({ error: 'Validation error', details: error.errors });
      return;
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message, code: error.code });
      return;
    }

    // body-parser errors (malformed JSON, oversized body) carry their own 4xx status
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      apiLogger.warn(`${req.method} ${req.path} rejected: ${errorMessage(error)}`, { status });
      res.status(status).json({ error: 'Invalid request body', code: 'invalid_body' });
      return;
    }

    apiLogger.error(`${req.method} ${req.path} crashed`, { error });
    res.status(500).json({
      error: 'Internal server error',
      message: config.env === 'development' && error instanceof Error ? error.message : 'Something went wrong',
    });
  };
}

export function createApp(deps: AppDependencies): Express {
  const { config, sessions } = deps;
  const qa = deps.qa ?? new SheetQA({ threshold: config.matchThreshold, listLimit: config.listLimit });
  const processor = deps.processor ?? new SpreadsheetProcessor(config.maxUploadBytes);

  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.requests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Muitas requisições, tente novamente mais tarde.' },
  });

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      sessions: sessions.size(),
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/upload', limiter, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new UploadFormatError('Nenhum arquivo enviado (campo "file")');
      }
      const fields = UploadFieldsSchema.parse(req.body ?? {});
      const loaded = await processor.process(req.file.buffer, req.file.originalname, { sheet: fields.sheet });
      const session = sessions.create(loaded.table, { fileName: loaded.originalName, sheetName: loaded.sheetName });

      res.json({
        session_id: session.id,
        message: `Arquivo ${loaded.originalName} recebido com sucesso`,
        sheet: loaded.sheetName,
        row_count: loaded.metadata.rowCount,
        columns: allColumnNames(loaded.table.columns),
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/ask', limiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = AskRequestSchema.parse(req.body);
      const session = sessions.require(body.session_id);

      const startTime = Date.now();
      const result = qa.ask(session.table, body.question);
      const history = sessions.appendHistory(session.id, {
        question: body.question,
        answer: result.answer,
        askedAt: new Date().toISOString(),
      });

      queryLogger.info('Question answered', {
        sessionId: session.id,
        intent: result.plan.intent,
        targetColumn: result.plan.targetColumn,
        filters: result.plan.filters.length,
        skipped: result.plan.skipped.length,
        resultKind: result.result.kind,
        executionTime: Date.now() - startTime,
      });

      res.json({
        answer: result.answer,
        history,
        ...(body.explain ? { explanation: result.explanation } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.require(req.params.id);
      res.json({
        session_id: session.id,
        file_name: session.fileName,
        sheet: session.sheetName,
        row_count: session.table.rows.length,
        columns: allColumnNames(session.table.columns),
        history: session.history,
      });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/sessions/:id', (req: Request, res: Response) => {
    if (!sessions.delete(req.params.id)) {
      res.status(404).json({ error: 'Sessão não encontrada', code: 'session_not_found' });
      return;
    }
    res.status(204).end();
  });

  app.use(errorHandler(config));

  return app;
}

// Initialize server
export async function startServer(config: AppConfig = loadConfig()): Promise<Server> {
  const sessions = new SessionStore({ ttlSeconds: config.sessionTtlSeconds });
  const app = createApp({ config, sessions });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, config.host, () => resolve(listening));
    listening.on('error', reject);
  });

  apiLogger.info(`🚀 SheetQA server running on http://${config.host}:${config.port}`);
  apiLogger.info(`📁 Uploads limited to ${Math.round(config.maxUploadBytes / (1024 * 1024))}MB per file`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down server...`);
    server.close(() => {
      sessions.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

// Start server if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}
