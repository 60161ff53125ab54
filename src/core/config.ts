/**
 * Alerting configuration: built-in defaults, then config/alerting.json,
 * then environment variables, then explicit overrides.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigError } from './errors';
import { validateAlertingConfig } from '@/validation/ajv_instance';

export type VixRange = [number, number];

export interface IngestPaths {
  portfolioJson: string;
  portfolioCsv: string;
  vixHistoryCsv: string;
}

export interface AlertingConfig {
  sellThreshold: number;
  reviewDeltaThreshold: number;
  riskFloor: number;
  circuitBreakerVixThreshold: number;
  vixInputRange: VixRange;
  ingest: IngestPaths;
}

export interface RawAlertingConfig {
  sell_threshold?: number;
  review_delta_threshold?: number;
  risk_floor?: number;
  circuit_breaker_vix_threshold?: number;
  vix_input_range?: VixRange;
  ingest?: {
    portfolio_json?: string;
    portfolio_csv?: string;
    vix_history_csv?: string;
  };
}

export type AlertingOverrides = Partial<Omit<AlertingConfig, 'ingest'>> & {
  ingest?: Partial<IngestPaths>;
};

export const DEFAULT_ALERTING_CONFIG: AlertingConfig = {
  sellThreshold: 5.0,
  reviewDeltaThreshold: 0.8,
  riskFloor: 0.1,
  circuitBreakerVixThreshold: 25.0,
  vixInputRange: [10.0, 80.0],
  ingest: {
    portfolioJson: 'data/scores_live.json',
    portfolioCsv: 'data/portfolio_scores.csv',
    vixHistoryCsv: 'data/vix_history.csv',
  },
};

const ENV_OVERRIDES = {
  SELL_THRESHOLD: 'sellThreshold',
  REVIEW_DELTA_THRESHOLD: 'reviewDeltaThreshold',
  RISK_FLOOR: 'riskFloor',
  CIRCUIT_BREAKER_VIX_THRESHOLD: 'circuitBreakerVixThreshold',
} as const;

let cachedConfig: AlertingConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function loadRawConfig(projectRoot: string): RawAlertingConfig | null {
  const path = join(projectRoot, 'config', 'alerting.json');
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError('config_invalid_json', path, { cause: error });
  }

  const result = validateAlertingConfig(parsed);
  if (!result.valid) {
    throw new ConfigError('config_invalid_schema', `${path} (${result.errors.join('; ')})`);
  }
  return result.data;
}

function resolvePath(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

function mergeRaw(base: AlertingConfig, raw: RawAlertingConfig | null): AlertingConfig {
  if (!raw) return base;
  return {
    sellThreshold: raw.sell_threshold ?? base.sellThreshold,
    reviewDeltaThreshold: raw.review_delta_threshold ?? base.reviewDeltaThreshold,
    riskFloor: raw.risk_floor ?? base.riskFloor,
    circuitBreakerVixThreshold: raw.circuit_breaker_vix_threshold ?? base.circuitBreakerVixThreshold,
    vixInputRange: raw.vix_input_range ?? base.vixInputRange,
    ingest: {
      portfolioJson: raw.ingest?.portfolio_json ?? base.ingest.portfolioJson,
      portfolioCsv: raw.ingest?.portfolio_csv ?? base.ingest.portfolioCsv,
      vixHistoryCsv: raw.ingest?.vix_history_csv ?? base.ingest.vixHistoryCsv,
    },
  };
}

function mergeEnv(base: AlertingConfig): AlertingConfig {
  const merged: AlertingConfig = { ...base };
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigError('config_invalid_env', `${name}=${raw} is not a number`);
    }
    merged[key] = value;
  }
  return merged;
}

export function mergeOverrides(base: AlertingConfig, overrides?: AlertingOverrides): AlertingConfig {
  if (!overrides) return base;
  return {
    sellThreshold: overrides.sellThreshold ?? base.sellThreshold,
    reviewDeltaThreshold: overrides.reviewDeltaThreshold ?? base.reviewDeltaThreshold,
    riskFloor: overrides.riskFloor ?? base.riskFloor,
    circuitBreakerVixThreshold: overrides.circuitBreakerVixThreshold ?? base.circuitBreakerVixThreshold,
    vixInputRange: overrides.vixInputRange ?? base.vixInputRange,
    ingest: { ...base.ingest, ...overrides.ingest },
  };
}

export function loadAlertingConfig(projectRoot: string = getProjectRoot()): AlertingConfig {
  const fromFile = mergeRaw(DEFAULT_ALERTING_CONFIG, loadRawConfig(projectRoot));
  const fromEnv = mergeEnv(fromFile);
  return {
    ...fromEnv,
    ingest: {
      portfolioJson: resolvePath(projectRoot, fromEnv.ingest.portfolioJson),
      portfolioCsv: resolvePath(projectRoot, fromEnv.ingest.portfolioCsv),
      vixHistoryCsv: resolvePath(projectRoot, fromEnv.ingest.vixHistoryCsv),
    },
  };
}

export function getAlertingConfig(): AlertingConfig {
  if (!cachedConfig) {
    cachedConfig = loadAlertingConfig();
  }
  return cachedConfig;
}

/** Loaded configuration with caller overrides applied on top. */
export function resolveAlertingConfig(overrides?: AlertingOverrides): AlertingConfig {
  return mergeOverrides(getAlertingConfig(), overrides);
}

export function resetConfig(): void {
  cachedConfig = null;
}
