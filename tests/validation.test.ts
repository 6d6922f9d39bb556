import { describe, it, expect } from 'vitest';
import { formatIsoDate, parseIsoDate, validateAggregate, validateWorker } from '../src/server/validation.js';
import { ValidationError } from '../src/server/errors.js';

describe('parseIsoDate', () => {
  it('parses a YYYY-MM-DD date', () => {
    expect(parseIsoDate('2025-01-04')).toEqual({ year: 2025, month: 1, day: 4 });
  });

  it('accepts February 29 in a leap year', () => {
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it.each([
    '03-01-2025',
    '2025-1-4',
    '2025-02-30',
    '2023-02-29',
    '1900-02-29',
    '2025-13-01',
    '2025-04-31',
    '0000-01-01',
    '2025-01-04T00:00:00',
    '',
  ])('rejects %j', (value) => {
    expect(parseIsoDate(value)).toBeNull();
  });
});

describe('formatIsoDate', () => {
  it('pads every component', () => {
    expect(formatIsoDate({ year: 987, month: 3, day: 7 })).toBe('0987-03-07');
  });
});

describe('validateAggregate', () => {
  it('converts form strings to typed values', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '1', silver: '2', diamond: '0.5' });

    expect(result).toEqual({
      ok: true,
      value: { year: 2025, month: 1, day: 4, gold: 1, silver: 2, diamond: 0.5 },
    });
  });

  it('accepts numbers that are already typed', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: 0, silver: 0, diamond: 0 });

    expect(result.ok).toBe(true);
  });

  it('rejects an unparseable date', () => {
    const result = validateAggregate({ date: '03-01-2025', gold: 1, silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.kind).toBe('invalid_date');
    expect(result.error.field).toBe('date');
    expect(result.error.message).toBe(
      `The 'date' field must be a valid date in YYYY-MM-DD format, got "03-01-2025".`
    );
  });

  it('rejects a negative quantity', () => {
    const result = validateAggregate({ date: '2025-01-03', gold: '-1', silver: '2', diamond: '0.5' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('negative');
    expect(result.error.field).toBe('gold');
    expect(result.error.message).toBe(`Positive values are needed! The 'gold' field is negative.`);
  });

  it('rejects a negative diamond amount', () => {
    const result = validateAggregate({ date: '2025-01-03', gold: 1, silver: 2, diamond: -0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('negative');
    expect(result.error.field).toBe('diamond');
  });

  it('rejects a fractional gold amount as the wrong type', () => {
    const result = validateAggregate({ date: '2025-01-03', gold: '1.5', silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('wrong_type');
    expect(result.error.field).toBe('gold');
    expect(result.error.message).toBe(`The 'gold' field must be an integer.`);
  });

  it('rejects text where a number is expected', () => {
    const result = validateAggregate({ date: '2025-01-03', gold: 1, silver: 'abc', diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('wrong_type');
    expect(result.error.field).toBe('silver');
  });

  it('reports a missing field', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '1', silver: '2' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('missing');
    expect(result.error.field).toBe('diamond');
    expect(result.error.message).toBe(`The 'diamond' field is required.`);
  });

  it('treats a blank form value as missing', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '  ', silver: '2', diamond: '1' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('missing');
    expect(result.error.field).toBe('gold');
  });

  it('reports the first failing field in form order', () => {
    const result = validateAggregate({ date: 'yesterday', gold: -1, silver: -2, diamond: -3 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('date');
  });

  it('rejects a date that is not a string', () => {
    const result = validateAggregate({ date: 20250104, gold: 1, silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('wrong_type');
    expect(result.error.field).toBe('date');
  });
});

describe('validateWorker', () => {
  it('trims the name and keeps the ISO date', () => {
    const result = validateWorker({ name: '  Kuka ', date: '2025-01-04', gold: '1', silver: '2', diamond: '0.5' });

    expect(result).toEqual({
      ok: true,
      value: { name: 'Kuka', date: '2025-01-04', gold: 1, silver: 2, diamond: 0.5 },
    });
  });

  it('rejects a blank name', () => {
    const result = validateWorker({ name: '   ', date: '2025-01-04', gold: 1, silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('empty');
    expect(result.error.field).toBe('name');
  });

  it('rejects a missing name', () => {
    const result = validateWorker({ date: '2025-01-04', gold: 1, silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('missing');
    expect(result.error.field).toBe('name');
  });

  it('rejects a day-first date', () => {
    const result = validateWorker({ name: 'Morgó', date: '03-01-2025', gold: 1, silver: 2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('invalid_date');
  });

  it('rejects a negative silver amount', () => {
    const result = validateWorker({ name: 'Szundi', date: '2025-01-03', gold: 1, silver: -2, diamond: 0.5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('negative');
    expect(result.error.field).toBe('silver');
  });
});

describe('quantity parsing', () => {
  it('rejects gold beyond the exactly representable integers', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '9007199254740993', silver: '1', diamond: '0' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('too_large');
    expect(result.error.field).toBe('gold');
    expect(result.error.message).toBe(`The 'gold' field must be at most 9007199254740991.`);
  });

  it('rejects an exponent-sized silver amount', () => {
    const result = validateWorker({
      name: 'Tudor',
      date: '2025-01-04',
      gold: '1',
      silver: '100000000000000000000000',
      diamond: '0',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('too_large');
    expect(result.error.field).toBe('silver');
  });

  it('accepts the largest safe integer', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '9007199254740991', silver: '0', diamond: '0' });

    expect(result).toEqual({
      ok: true,
      value: { year: 2025, month: 1, day: 4, gold: 9007199254740991, silver: 0, diamond: 0 },
    });
  });

  it('accepts a diamond amount with a leading decimal point', () => {
    const result = validateWorker({ name: 'Kuka', date: '2025-01-04', gold: '1', silver: '2', diamond: '.5' });

    expect(result).toEqual({
      ok: true,
      value: { name: 'Kuka', date: '2025-01-04', gold: 1, silver: 2, diamond: 0.5 },
    });
  });

  it('accepts a diamond amount in exponent notation', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '1', silver: '2', diamond: '1e-3' });

    expect(result).toEqual({
      ok: true,
      value: { year: 2025, month: 1, day: 4, gold: 1, silver: 2, diamond: 0.001 },
    });
  });

  it('still rejects a fractional gold amount written with an exponent', () => {
    const result = validateAggregate({ date: '2025-01-04', gold: '1e-3', silver: '2', diamond: '0' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('wrong_type');
    expect(result.error.field).toBe('gold');
  });
});
