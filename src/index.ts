export { normalizeRow, normalizeTable, canonicalizeRow, REQUIRED_COLUMN_DEFAULTS } from './scoring/normalize';
export { computeDeltas, buildScoreRecord, parseNumeric, type DeltaOutcome } from './scoring/delta';
export {
  sectorAllocation,
  averageScore,
  averageRisk,
  riskAdjustedRatio,
  summarizePortfolio,
  type SectorAllocation,
  type PortfolioSummary,
} from './scoring/aggregate';
export { classifyAlerts, classifyRecord, summarizeAlerts, type AlertSummary } from './alerts/classifier';
export {
  DEFAULT_ALERT_RULES,
  sellSignalRule,
  reviewPositionRule,
  type AlertRule,
  type AlertThresholds,
} from './alerts/rules';
export {
  evaluateRiskRegime,
  describeRiskRegime,
  clampVixInput,
  type RiskRegime,
  type RiskRegimeResult,
} from './regime/engine';
export { summarizeVixHistory, type VixHistorySummary } from './regime/history';
export {
  buildBreakdown,
  flattenBreakdown,
  buildScoreFallback,
  groupBySector,
  resolveBreakdown,
  type BreakdownMatrix,
  type BreakdownTriple,
  type BreakdownView,
  type FallbackEntry,
  type PivotResult,
} from './lib/scoreBreakdown';
export {
  buildOverviewRows,
  listSectors,
  scoreBounds,
  filterScores,
  formatMetric,
  type OverviewRow,
  type ScoreFilters,
} from './lib/scoreView';
export { evaluatePortfolio, type EvaluateOptions, type PortfolioEvaluation } from './run/evaluate';
export { loadPortfolioTable, parseCsvTable, type LoadedTable } from './data/portfolio';
export { loadVixHistory, parseVixHistory } from './data/vix';
export {
  DEFAULT_ALERTING_CONFIG,
  getAlertingConfig,
  loadAlertingConfig,
  resolveAlertingConfig,
  resetConfig,
  type AlertingConfig,
  type AlertingOverrides,
} from './core/config';
export { AppError, IngestError, ConfigError, EmptyInputError } from './core/errors';
export type * from './types/portfolio';
