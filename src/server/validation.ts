/**
 * Input validation for production submissions.
 *
 * Validators never throw for bad input: they return a ValidationResult so
 * the caller has to look at the failure before it can reach the value.
 */
import { z } from 'zod';
import { ValidationError, type ValidationErrorKind } from './errors.js';
import type {
  AggregateProductionInput,
  AggregateSubmission,
  WorkerProductionInput,
  WorkerSubmission,
} from './types/production.js';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const NUMERIC_PATTERN = /^-?(\d+(\.\d+)?|\.\d+)([eE][-+]?\d+)?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parses a strict YYYY-MM-DD string. Returns null for anything that is not
 * a real calendar date ("03-01-2025", "2025-02-30", "2025-1-4").
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function formatIsoDate({ year, month, day }: CalendarDate): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

// Form posts arrive as strings; numeric strings become numbers, blanks count as missing.
function coerceNumeric(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  return NUMERIC_PATTERN.test(trimmed) ? Number(trimmed) : value;
}

function quantity(field: string, integer: boolean) {
  const typeMessage = integer
    ? `The '${field}' field must be an integer.`
    : `The '${field}' field must be a number.`;

  let schema = z
    .number({ required_error: `The '${field}' field is required.`, invalid_type_error: typeMessage })
    .finite({ message: typeMessage });
  if (integer) {
    // Larger integers lose precision before they reach SQLite.
    schema = schema
      .int({ message: typeMessage })
      .max(Number.MAX_SAFE_INTEGER, { message: `The '${field}' field must be at most ${Number.MAX_SAFE_INTEGER}.` });
  }

  return z.preprocess(
    coerceNumeric,
    schema.nonnegative({ message: `Positive values are needed! The '${field}' field is negative.` })
  );
}

function calendarDate(field: string) {
  return z
    .string({
      required_error: `The '${field}' field is required.`,
      invalid_type_error: `The '${field}' field must be a string.`,
    })
    .transform((value, ctx) => {
      const parsed = parseIsoDate(value);
      if (!parsed) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `The '${field}' field must be a valid date in YYYY-MM-DD format, got "${value}".`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

const workerName = z
  .string({
    required_error: `The 'name' field is required.`,
    invalid_type_error: `The 'name' field must be a string.`,
  })
  .trim()
  .min(1, { message: `The 'name' field must not be empty.` });

// Key order is the order fields are reported in.
const aggregateSchema = z.object({
  date: calendarDate('date'),
  gold: quantity('gold', true),
  silver: quantity('silver', true),
  diamond: quantity('diamond', false),
});

const workerSchema = z.object({
  name: workerName,
  date: calendarDate('date'),
  gold: quantity('gold', true),
  silver: quantity('silver', true),
  diamond: quantity('diamond', false),
});

function issueKind(issue: z.ZodIssue): ValidationErrorKind {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === z.ZodParsedType.undefined ? 'missing' : 'wrong_type';
    case z.ZodIssueCode.too_small:
      return issue.type === 'string' ? 'empty' : 'negative';
    case z.ZodIssueCode.too_big:
      return 'too_large';
    case z.ZodIssueCode.custom:
      return 'invalid_date';
    default:
      return 'wrong_type';
  }
}

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('wrong_type', 'form', 'Invalid submission.');
  }
  const field = issue.path.length > 0 ? String(issue.path[0]) : 'form';
  return new ValidationError(issueKind(issue), field, issue.message);
}

export function validateAggregate(submission: AggregateSubmission): ValidationResult<AggregateProductionInput> {
  const parsed = aggregateSchema.safeParse(submission);
  if (!parsed.success) {
    return { ok: false, error: toValidationError(parsed.error) };
  }

  const { date, gold, silver, diamond } = parsed.data;
  return {
    ok: true,
    value: { year: date.year, month: date.month, day: date.day, gold, silver, diamond },
  };
}

export function validateWorker(submission: WorkerSubmission): ValidationResult<WorkerProductionInput> {
  const parsed = workerSchema.safeParse(submission);
  if (!parsed.success) {
    return { ok: false, error: toValidationError(parsed.error) };
  }

  const { name, date, gold, silver, diamond } = parsed.data;
  return {
    ok: true,
    value: { name, date: formatIsoDate(date), gold, silver, diamond },
  };
}
