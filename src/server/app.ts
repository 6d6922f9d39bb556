/**
 * Express application factory. Everything the routes need is passed in,
 * so tests can build an app around an in-memory database.
 */
import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DatabaseHandle } from './database.js';
import { AppError, StorageError, ValidationError, describeError } from './errors.js';
import { loggerMiddleware } from './middleware/logger.js';
import { createProductionHandlers } from './handlers/production.js';
import type { ChartOptions } from './services/chart.js';

export interface AppOptions {
  db: DatabaseHandle;
  chart: ChartOptions;
  viewsDir: string;
  logRequests?: boolean;
}

interface ClientHttpError {
  status: number;
  message: string;
}

// body-parser rejects malformed bodies with a 4xx status on the error
function isClientHttpError(err: unknown): err is ClientHttpError {
  if (!(err instanceof Error) || !('status' in err)) return false;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = req.metadata?.request_id ?? '-';

  if (err instanceof ValidationError) {
    res.status(err.status).json({ error: err.message, field: err.field, kind: err.kind });
    return;
  }
  if (err instanceof StorageError) {
    console.error(`[Error] ${err.message} (id=${requestId})`);
    res.status(err.status).json({ error: 'Database error' });
    return;
  }
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (isClientHttpError(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }

  console.error(`[Error] Unhandled: ${describeError(err)} (id=${requestId})`);
  res.status(500).json({ error: 'Internal server error' });
}

export function createApp({ db, chart, viewsDir, logRequests = true }: AppOptions): Express {
  const formPage = readFileSync(join(viewsDir, 'form.html'), 'utf-8');
  const handlers = createProductionHandlers(db, chart);

  const app = express();
  app.use(loggerMiddleware({ logRequests }));
  app.use(express.urlencoded({ extended: false, limit: '10kb' }));
  app.use(express.json({ limit: '10kb' }));

  app.get('/form', (_req, res) => {
    res.type('html').send(formPage);
  });

  app.post('/submit', handlers.submitAggregate);
  app.post('/submit-dwarf', handlers.submitWorker);

  app.get('/query_last_production_data', handlers.queryLatestAggregate);
  app.get('/query_latest_dwarf_data', handlers.queryLatestWorker);

  app.get('/export-csv-termeles', handlers.exportAggregateCsv);
  app.get('/export-csv-dwarf', handlers.exportWorkerCsv);

  app.get('/plot-data', handlers.plotData);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
