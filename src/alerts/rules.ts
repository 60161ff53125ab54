import type { AlertingConfig } from '@/core/config';
import type { Alert, AlertKind, ScoreRecord } from '@/types/portfolio';

export type AlertThresholds = Pick<AlertingConfig, 'sellThreshold' | 'reviewDeltaThreshold'>;

export interface AlertRule {
  kind: AlertKind;
  matches(record: ScoreRecord, thresholds: AlertThresholds): boolean;
  build(record: ScoreRecord, thresholds: AlertThresholds): Alert;
}

export function formatSigned(value: number, decimals: number = 2): string {
  const fixed = value.toFixed(decimals);
  return value >= 0 ? `+${fixed}` : fixed;
}

/** Whole thresholds keep one decimal (`5.0`); others print as configured (`4.74`). */
export function formatThreshold(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export const sellSignalRule: AlertRule = {
  kind: 'SELL_SIGNAL',
  matches: (record, thresholds) => record.score < thresholds.sellThreshold,
  build: (record, thresholds) => ({
    symbol: record.symbol,
    kind: 'SELL_SIGNAL',
    value: record.score,
    message: `${record.symbol}: Score < ${formatThreshold(thresholds.sellThreshold)} → SELL signal`,
  }),
};

export const reviewPositionRule: AlertRule = {
  kind: 'REVIEW_POSITION',
  matches: (record, thresholds) => Math.abs(record.score_change) > thresholds.reviewDeltaThreshold,
  build: (record) => ({
    symbol: record.symbol,
    kind: 'REVIEW_POSITION',
    value: record.score_change,
    message: `${record.symbol}: Δ Score ${formatSigned(record.score_change)} → Review position`,
  }),
};

/** Evaluated top to bottom; the first match wins. */
export const DEFAULT_ALERT_RULES: readonly AlertRule[] = [sellSignalRule, reviewPositionRule];
