/**
 * Route handlers. Each one reads the request, calls a service with the
 * injected database handle and writes the response; thrown AppErrors are
 * left for errorHandler in app.ts.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { DatabaseHandle } from '../database.js';
import { recordAggregate, recordWorker } from '../services/production.js';
import {
  exportAggregateCsv,
  exportWorkerCsv,
  latestAggregate,
  latestWorker,
} from '../services/queries.js';
import { renderTimeSeries, type ChartOptions } from '../services/chart.js';

export const AGGREGATE_EXPORT_FILENAME = 'ossztermeles_export.csv';
export const WORKER_EXPORT_FILENAME = 'egyeni_termeles_export.csv';

export interface ProductionHandlers {
  submitAggregate: RequestHandler;
  submitWorker: RequestHandler;
  queryLatestAggregate: RequestHandler;
  queryLatestWorker: RequestHandler;
  exportAggregateCsv: RequestHandler;
  exportWorkerCsv: RequestHandler;
  plotData: RequestHandler;
}

type FormBody = Record<string, unknown> | undefined;

function field(body: FormBody, name: string): unknown {
  return body ? body[name] : undefined;
}

function sendCsv(res: Response, filename: string, csv: string): void {
  res.attachment(filename);
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.send(csv);
}

export function createProductionHandlers(db: DatabaseHandle, chart: ChartOptions): ProductionHandlers {
  return {
    submitAggregate: (req: Request, res: Response, next: NextFunction) => {
      const result = recordAggregate(db, {
        date: field(req.body, 'datum'),
        gold: field(req.body, 'arany'),
        silver: field(req.body, 'ezust'),
        diamond: field(req.body, 'gyemant'),
      });
      if (!result.ok) return next(result.error);

      console.log(`[Production] Aggregate #${result.value.id} stored`);
      res.json({ message: 'Data inserted successfully!' });
    },

    submitWorker: (req: Request, res: Response, next: NextFunction) => {
      const result = recordWorker(db, {
        name: field(req.body, 'name'),
        date: field(req.body, 'datum'),
        gold: field(req.body, 'gold'),
        silver: field(req.body, 'silver'),
        diamond: field(req.body, 'diamond'),
      });
      if (!result.ok) return next(result.error);

      console.log(`[Production] Worker entry #${result.value.id} stored for "${result.value.name}"`);
      res.json({ message: 'Dwarf data inserted successfully!' });
    },

    queryLatestAggregate: (_req: Request, res: Response) => {
      res.json(latestAggregate(db));
    },

    queryLatestWorker: (_req: Request, res: Response) => {
      res.json(latestWorker(db));
    },

    exportAggregateCsv: (_req: Request, res: Response) => {
      sendCsv(res, AGGREGATE_EXPORT_FILENAME, exportAggregateCsv(db));
    },

    exportWorkerCsv: (_req: Request, res: Response) => {
      sendCsv(res, WORKER_EXPORT_FILENAME, exportWorkerCsv(db));
    },

    plotData: (_req: Request, res: Response) => {
      const png = renderTimeSeries(db, chart);
      res.type('png').send(png);
    },
  };
}
