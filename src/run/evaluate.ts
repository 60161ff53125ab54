/**
 * One refresh: normalize → deltas → {alerts, aggregates}, plus the regime
 * when a VIX reading is supplied. Each call is an isolated batch.
 */

import { classifyAlerts, summarizeAlerts, type AlertSummary } from '@/alerts/classifier';
import { resolveAlertingConfig, type AlertingConfig } from '@/core/config';
import { IngestError } from '@/core/errors';
import { describeRiskRegime, type RiskRegimeResult } from '@/regime/engine';
import { summarizePortfolio, type PortfolioSummary } from '@/scoring/aggregate';
import { computeDeltas } from '@/scoring/delta';
import { normalizeTable } from '@/scoring/normalize';
import { validateTable } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { Alert, InvalidRecord, ScoreRecord } from '@/types/portfolio';

const logger = createChildLogger('evaluate');

export interface EvaluateOptions {
  /** Used as-is; when omitted the loaded configuration applies. */
  config?: AlertingConfig;
  currentVix?: number;
}

export interface PortfolioEvaluation {
  records: ScoreRecord[];
  diagnostics: InvalidRecord[];
  alerts: Alert[];
  alertSummary: AlertSummary;
  summary: PortfolioSummary;
  regime: RiskRegimeResult | null;
  config: AlertingConfig;
}

export function evaluatePortfolio(table: unknown, options: EvaluateOptions = {}): PortfolioEvaluation {
  const validation = validateTable(table);
  if (!validation.valid) {
    throw new IngestError('ingest_invalid_table', validation.errors.join('; '));
  }

  const config = options.config ?? resolveAlertingConfig();
  const { records, diagnostics } = computeDeltas(normalizeTable(validation.data));

  if (diagnostics.length > 0) {
    logger.warn(
      { invalid: diagnostics.length, rows: validation.data.length },
      'Excluded invalid records from evaluation'
    );
  }

  const alerts = classifyAlerts(records, config);
  const summary = summarizePortfolio(records, config.riskFloor);
  const regime =
    options.currentVix === undefined ? null : describeRiskRegime(options.currentVix, config);

  logger.debug(
    { records: records.length, alerts: alerts.length, regime: regime?.regime ?? null },
    'Portfolio evaluated'
  );

  return {
    records,
    diagnostics,
    alerts,
    alertSummary: summarizeAlerts(alerts),
    summary,
    regime,
    config,
  };
}
