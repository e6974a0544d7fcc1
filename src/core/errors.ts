/**
 * Custom error types for the analysis pipeline.
 * Enables callers to handle different failure modes appropriately.
 */

import type { CanonicalColumn } from './types.js';

export type InputName = 'historical' | 'incoming';

export class MissingKeyError extends Error {
  constructor(
    public readonly input: InputName,
    public readonly missing: CanonicalColumn[],
    public readonly rowIndex: number | null = null
  ) {
    const where = rowIndex === null ? 'column' : `value in row ${rowIndex}`;
    super(`The ${input} records are missing required key ${where}: ${missing.join(', ')}`);
    this.name = 'MissingKeyError';
  }
}

export class SchemaError extends Error {
  constructor(
    message: string,
    public readonly missing: CanonicalColumn[] = []
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class PeriodFormatError extends SchemaError {
  constructor(public readonly periods: string[]) {
    super(
      `Period tokens must share one fixed width to sort chronologically (e.g. 2024-01). Found: ${periods.join(', ')}`
    );
    this.name = 'PeriodFormatError';
  }
}

export class InsufficientPeriodsError extends Error {
  constructor(
    message: string,
    public readonly available: number
  ) {
    super(message);
    this.name = 'InsufficientPeriodsError';
  }
}

export class PeriodNotFoundError extends Error {
  constructor(
    public readonly period: string,
    public readonly availablePeriods: string[]
  ) {
    super(`Period "${period}" not found. Available periods: ${availablePeriods.join(', ') || 'none'}`);
    this.name = 'PeriodNotFoundError';
  }
}

export class IngestError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'IngestError';
  }
}
