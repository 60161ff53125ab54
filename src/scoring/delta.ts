/**
 * Score delta calculation and typed record construction.
 * score_change is always recomputed; a supplied value is never trusted.
 */

import { isMissing } from './normalize';
import type { InvalidRecord, InvalidRecordField, NormalizedRow, ScoreRecord } from '@/types/portfolio';

export interface DeltaOutcome {
  records: ScoreRecord[];
  diagnostics: InvalidRecord[];
}

type RowResult = { ok: true; record: ScoreRecord } | { ok: false; diagnostic: InvalidRecord };

export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function asText(value: unknown, fallback: string): string {
  if (isMissing(value)) return fallback;
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

function optionalNumeric(value: unknown): number | null {
  return isMissing(value) ? null : parseNumeric(value);
}

function invalid(
  rowIndex: number,
  symbol: string | null,
  field: InvalidRecordField,
  value: unknown,
  reason: string
): RowResult {
  return { ok: false, diagnostic: { row_index: rowIndex, symbol, field, value, reason } };
}

export function buildScoreRecord(row: NormalizedRow, rowIndex: number): RowResult {
  const symbol = asText(row.symbol, '');
  if (!symbol) {
    return invalid(rowIndex, null, 'symbol', row.symbol, 'symbol is missing or blank');
  }

  const score = parseNumeric(row.score);
  if (score === null) {
    return invalid(rowIndex, symbol, 'score', row.score, 'score is not numeric');
  }

  const prevScore = parseNumeric(row.prev_score);
  if (prevScore === null) {
    return invalid(rowIndex, symbol, 'prev_score', row.prev_score, 'prev_score is not numeric');
  }

  const weight = parseNumeric(row.weight);
  if (weight === null) {
    return invalid(rowIndex, symbol, 'weight', row.weight, 'weight is not numeric');
  }

  let risk: number | null = null;
  if (!isMissing(row.risk)) {
    risk = parseNumeric(row.risk);
    if (risk === null) {
      return invalid(rowIndex, symbol, 'risk', row.risk, 'risk is not numeric');
    }
  }

  const record: ScoreRecord = {
    symbol,
    company: asText(row.company, ''),
    sector: asText(row.sector, ''),
    score,
    prev_score: prevScore,
    score_change: score - prevScore,
    weight,
    verdict: asText(row.verdict, 'N/A'),
    risk,
    fundamental: optionalNumeric(row.fundamental),
    technical: optionalNumeric(row.technical),
    macro: optionalNumeric(row.macro),
    sentiment: optionalNumeric(row.sentiment),
  };

  if (!isMissing(row.category)) {
    record.category = asText(row.category, '');
  }
  const component = optionalNumeric(row.score_component);
  if (component !== null) {
    record.score_component = component;
  }

  return { ok: true, record };
}

export function computeDeltas(rows: readonly NormalizedRow[]): DeltaOutcome {
  const records: ScoreRecord[] = [];
  const diagnostics: InvalidRecord[] = [];

  rows.forEach((row, index) => {
    const result = buildScoreRecord(row, index);
    if (result.ok) {
      records.push(result.record);
    } else {
      diagnostics.push(result.diagnostic);
    }
  });

  return { records, diagnostics };
}
