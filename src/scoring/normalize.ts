/**
 * Record schema normalization
 * Canonicalises column names and fills the required columns with defaults,
 * so nothing downstream has to check whether a column exists.
 */

import type { NormalizedRow, RawRow } from '@/types/portfolio';

export const REQUIRED_COLUMN_DEFAULTS = {
  prev_score: 0.0,
  score_change: 0.0,
  verdict: 'N/A',
  weight: 0.0,
} as const;

type RequiredColumn = keyof typeof REQUIRED_COLUMN_DEFAULTS;

const REQUIRED_COLUMNS: readonly RequiredColumn[] = ['prev_score', 'score_change', 'verdict', 'weight'];

export function canonicalColumn(name: string): string {
  return name.trim().toLowerCase();
}

/** Absent, null, undefined and empty-string cells all count as missing. */
export function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function canonicalizeRow(row: RawRow): RawRow {
  const out: RawRow = {};
  for (const [key, value] of Object.entries(row)) {
    const column = canonicalColumn(key);
    if (!(column in out)) {
      out[column] = value;
    }
  }
  return out;
}

export function normalizeRow(row: RawRow): NormalizedRow {
  const canonical = canonicalizeRow(row);
  const filled: NormalizedRow = {
    ...canonical,
    prev_score: canonical.prev_score,
    score_change: canonical.score_change,
    verdict: canonical.verdict,
    weight: canonical.weight,
  };

  for (const column of REQUIRED_COLUMNS) {
    if (isMissing(filled[column])) {
      filled[column] = REQUIRED_COLUMN_DEFAULTS[column];
    }
  }

  return filled;
}

export function normalizeTable(rows: readonly RawRow[]): NormalizedRow[] {
  return rows.map(normalizeRow);
}
