/**
 * Persistence for production submissions: validate, normalize, insert.
 * Validation failures come back as a result; storage failures are thrown
 * as StorageError by withTransaction.
 */
import {
  insertAggregate,
  insertWorker,
  withTransaction,
  type DatabaseHandle,
} from '../database.js';
import { validateAggregate, validateWorker, type ValidationResult } from '../validation.js';
import type {
  AggregateProductionRecord,
  AggregateSubmission,
  WorkerProductionRecord,
  WorkerSubmission,
} from '../types/production.js';

export function recordAggregate(
  db: DatabaseHandle,
  submission: AggregateSubmission
): ValidationResult<AggregateProductionRecord> {
  const validated = validateAggregate(submission);
  if (!validated.ok) return validated;

  const record = withTransaction(db, (tx) => insertAggregate(tx, validated.value));
  return { ok: true, value: record };
}

export function recordWorker(
  db: DatabaseHandle,
  submission: WorkerSubmission
): ValidationResult<WorkerProductionRecord> {
  const validated = validateWorker(submission);
  if (!validated.ok) return validated;

  const record = withTransaction(db, (tx) => insertWorker(tx, validated.value));
  return { ok: true, value: record };
}
