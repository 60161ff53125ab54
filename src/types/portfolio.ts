/**
 * Portfolio scoring table types.
 * Field names mirror the ingest columns (snake case, lower-cased).
 */

/** A row as it arrives from JSON or CSV, before any checks. */
export type RawRow = Record<string, unknown>;

/** A row after column canonicalisation and default filling. */
export interface NormalizedRow extends RawRow {
  prev_score: unknown;
  score_change: unknown;
  verdict: unknown;
  weight: unknown;
}

export interface ScoreRecord {
  symbol: string;
  company: string;
  sector: string;
  score: number;
  prev_score: number;
  score_change: number;
  weight: number;
  verdict: string;
  risk: number | null;
  fundamental: number | null;
  technical: number | null;
  macro: number | null;
  sentiment: number | null;
  category?: string;
  score_component?: number;
}

export interface VixRecord {
  date: string;
  vix: number;
}

export type AlertKind = 'SELL_SIGNAL' | 'REVIEW_POSITION';

export interface Alert {
  symbol: string;
  kind: AlertKind;
  /** `score` for a sell signal, `score_change` for a review. */
  value: number;
  message: string;
}

export type InvalidRecordField = 'symbol' | 'score' | 'prev_score' | 'weight' | 'risk';

export interface InvalidRecord {
  row_index: number;
  symbol: string | null;
  field: InvalidRecordField;
  value: unknown;
  reason: string;
}
