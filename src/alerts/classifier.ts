import { DEFAULT_ALERT_RULES, type AlertRule, type AlertThresholds } from './rules';
import { DEFAULT_ALERTING_CONFIG } from '@/core/config';
import type { Alert, ScoreRecord } from '@/types/portfolio';

export interface AlertSummary {
  stable: boolean;
  count: number;
  headline: string;
}

const DEFAULT_THRESHOLDS: AlertThresholds = {
  sellThreshold: DEFAULT_ALERTING_CONFIG.sellThreshold,
  reviewDeltaThreshold: DEFAULT_ALERTING_CONFIG.reviewDeltaThreshold,
};

export function classifyRecord(
  record: ScoreRecord,
  thresholds: AlertThresholds = DEFAULT_THRESHOLDS,
  rules: readonly AlertRule[] = DEFAULT_ALERT_RULES
): Alert | null {
  const rule = rules.find((candidate) => candidate.matches(record, thresholds));
  return rule ? rule.build(record, thresholds) : null;
}

export function classifyAlerts(
  records: readonly ScoreRecord[],
  thresholds: AlertThresholds = DEFAULT_THRESHOLDS,
  rules: readonly AlertRule[] = DEFAULT_ALERT_RULES
): Alert[] {
  const alerts: Alert[] = [];
  for (const record of records) {
    const alert = classifyRecord(record, thresholds, rules);
    if (alert) {
      alerts.push(alert);
    }
  }
  return alerts;
}

export function summarizeAlerts(alerts: readonly Alert[]): AlertSummary {
  if (alerts.length === 0) {
    return { stable: true, count: 0, headline: 'No alerts – portfolio stable.' };
  }
  return {
    stable: false,
    count: alerts.length,
    headline: `${alerts.length} alert(s) require attention`,
  };
}
