import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseKeywordList } from '../config/env.js';
import type { AppConfig } from '../config/env.js';
import type { StaticConfig } from '../config/static-config.js';
import { AWARD_SHEET_COLUMNS, writeAwardsWorkbook } from '../exporter/workbook-sink.js';
import { HttpStatusError, RunAbortedError } from '../scraper/errors.js';
import type { AwardRunReport, AwardSink } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/api under tsx, dist/src/api once built
const PUBLIC_DIR = [
  path.join(__dirname, '../../public'),
  path.join(__dirname, '../../../public'),
].find(dir => existsSync(dir));

export interface AppDeps {
  appConfig: AppConfig;
  staticConfig: StaticConfig;
  runPipeline: (keywords?: string[], signal?: AbortSignal) => Promise<AwardRunReport>;
  sink: AwardSink;
  logger: Logger;
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

const asyncHandler = (fn: AsyncRoute) =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };

// `?keywords=` with nothing in it disables the description filter
function keywordsFromQuery(req: Request): string[] | undefined {
  const value = req.query.keywords;
  return typeof value === 'string' ? parseKeywordList(value) : undefined;
}

// Aborts when the client disconnects before the response is sent
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  if (PUBLIC_DIR) app.use(express.static(PUBLIC_DIR));

  const requireAuth = (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.header('x-api-key');
    const expectedKey = deps.appConfig.adminApiKey;

    if (!expectedKey) {
      deps.logger.error('ADMIN_API_KEY is not set. Access denied to protected endpoint.');
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'Server security configuration is missing.',
      });
      return;
    }

    if (!apiKey || apiKey !== expectedKey) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Valid x-api-key header is required',
      });
      return;
    }

    next();
  };

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/config', (req, res) => {
    res.json({
      keywords: deps.staticConfig.keywords,
      timePeriod: deps.staticConfig.timePeriod,
      groups: deps.staticConfig.groups,
      columns: AWARD_SHEET_COLUMNS,
    });
  });

  app.get('/api/awards', asyncHandler(async (req, res) => {
    const report = await deps.runPipeline(keywordsFromQuery(req), abortOnDisconnect(res));
    res.json({
      evaluatedAt: report.evaluatedAt,
      keywords: report.keywords,
      count: report.awards.length,
      warnings: report.warnings,
      groups: report.groups,
      awards: report.awards,
    });
  }));

  app.get('/api/awards/export', asyncHandler(async (req, res) => {
    const report = await deps.runPipeline(keywordsFromQuery(req), abortOnDisconnect(res));
    const buffer = writeAwardsWorkbook(report.awards, new Date(report.evaluatedAt));
    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.setHeader('Content-Disposition', 'attachment; filename="awards.xlsx"');
    res.send(buffer);
  }));

  app.post('/api/awards/refresh', requireAuth, asyncHandler(async (req, res) => {
    const report = await deps.runPipeline();
    const lastUpdated = new Date(report.evaluatedAt);
    await deps.sink.publish(report.awards, lastUpdated);
    res.json({
      success: true,
      count: report.awards.length,
      warnings: report.warnings,
      lastUpdated: lastUpdated.toISOString(),
    });
  }));

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'Not Found', message: `API route not found: ${req.method} ${req.originalUrl}` });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RunAbortedError) {
      deps.logger.warn('Request closed before the award run finished', { path: req.originalUrl });
      return;
    }
    deps.logger.error('API Error', { name: err.name, message: err.message });
    const status = err instanceof HttpStatusError ? 502 : 500;
    res.status(status).json({ error: err.message || 'Internal server error' });
  });

  return app;
}
