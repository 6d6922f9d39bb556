// Row shapes as stored in SQLite. Column names follow migrations/001_production.sql.

export interface AggregateProductionRecord {
  id: number;
  ev: number;
  honap: number;
  nap: number;
  aranytermeles: number;
  ezusttermeles: number;
  gyemanttermeles: number;
}

export interface WorkerProductionRecord {
  id: number;
  name: string;
  /** ISO calendar date, YYYY-MM-DD */
  date: string;
  gold: number;
  silver: number;
  diamond: number;
}

// Raw submissions: whatever the form (or a direct caller) handed over.
export interface AggregateSubmission {
  date?: unknown;
  gold?: unknown;
  silver?: unknown;
  diamond?: unknown;
}

export interface WorkerSubmission extends AggregateSubmission {
  name?: unknown;
}

// Validated and normalized, ready to insert.
export interface AggregateProductionInput {
  year: number;
  month: number;
  day: number;
  gold: number;
  silver: number;
  diamond: number;
}

export interface WorkerProductionInput {
  name: string;
  date: string;
  gold: number;
  silver: number;
  diamond: number;
}

export interface TimeSeriesPoint {
  date: Date;
  gold: number;
  silver: number;
  diamond: number;
}
