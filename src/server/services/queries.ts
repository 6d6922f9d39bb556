import {
  getLatestAggregate,
  getLatestWorker,
  iterateAggregates,
  iterateWorkers,
  withRead,
  type DatabaseHandle,
} from '../database.js';
import { NotFoundError } from '../errors.js';
import { toCsv, type CsvColumn } from './csv.js';
import type { AggregateProductionRecord, WorkerProductionRecord } from '../types/production.js';

export interface LatestAggregateView {
  arany: number;
  ezust: number;
  gyemant: number;
}

export interface LatestWorkerView {
  gold: number;
  silver: number;
  diamond: number;
}

export const AGGREGATE_CSV_COLUMNS: readonly CsvColumn<AggregateProductionRecord>[] = [
  { header: 'ID', value: (row) => row.id },
  { header: 'Év', value: (row) => row.ev },
  { header: 'Hónap', value: (row) => row.honap },
  { header: 'Nap', value: (row) => row.nap },
  { header: 'Aranytermelés', value: (row) => row.aranytermeles },
  { header: 'Ezüsttermelés', value: (row) => row.ezusttermeles },
  { header: 'Gyémánttermelés', value: (row) => row.gyemanttermeles },
];

export const WORKER_CSV_COLUMNS: readonly CsvColumn<WorkerProductionRecord>[] = [
  { header: 'ID', value: (row) => row.id },
  { header: 'Name', value: (row) => row.name },
  { header: 'Date', value: (row) => row.date },
  { header: 'Gold', value: (row) => row.gold },
  { header: 'Silver', value: (row) => row.silver },
  { header: 'Diamond', value: (row) => row.diamond },
];

export function latestAggregate(db: DatabaseHandle): LatestAggregateView {
  const record = withRead(() => getLatestAggregate(db));
  if (!record) throw new NotFoundError();
  return {
    arany: record.aranytermeles,
    ezust: record.ezusttermeles,
    gyemant: record.gyemanttermeles,
  };
}

export function latestWorker(db: DatabaseHandle): LatestWorkerView {
  const record = withRead(() => getLatestWorker(db));
  if (!record) throw new NotFoundError();
  return {
    gold: record.gold,
    silver: record.silver,
    diamond: record.diamond,
  };
}

function exportCsv<T>(columns: readonly CsvColumn<T>[], rows: () => IterableIterator<T>): string {
  let count = 0;
  function* counted(): Generator<T> {
    for (const row of rows()) {
      count++;
      yield row;
    }
  }

  const csv = withRead(() => toCsv(columns, counted()));
  if (count === 0) throw new NotFoundError();
  return csv;
}

export function exportAggregateCsv(db: DatabaseHandle): string {
  return exportCsv(AGGREGATE_CSV_COLUMNS, () => iterateAggregates(db));
}

export function exportWorkerCsv(db: DatabaseHandle): string {
  return exportCsv(WORKER_CSV_COLUMNS, () => iterateWorkers(db));
}
