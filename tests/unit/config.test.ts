import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_ALERTING_CONFIG,
  getAlertingConfig,
  loadAlertingConfig,
  mergeOverrides,
  resetConfig,
  resolveAlertingConfig,
} from '@/core/config';
import { ConfigError } from '@/core/errors';

const ENV_KEYS = ['SELL_THRESHOLD', 'REVIEW_DELTA_THRESHOLD', 'RISK_FLOOR', 'CIRCUIT_BREAKER_VIX_THRESHOLD'];

let tempDir: string;
const originalEnv: Record<string, string | undefined> = {};

function writeConfig(dir: string, content: string) {
  const configDir = join(dir, 'config');
  mkdirSync(configDir, { recursive: true });
  writeFileSync(join(configDir, 'alerting.json'), content);
}

function expectConfigError(fn: () => unknown, code: string) {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.code : null).toBe(code);
    return;
  }
  throw new Error('expected a ConfigError');
}

describe('alerting config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'alerting-config-'));
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
  });

  afterEach(() => {
    resetConfig();
    rmSync(tempDir, { recursive: true, force: true });
    ENV_KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('uses defaults when no alerting.json exists', () => {
    const config = loadAlertingConfig(tempDir);

    expect(config.sellThreshold).toBe(5.0);
    expect(config.reviewDeltaThreshold).toBe(0.8);
    expect(config.riskFloor).toBe(0.1);
    expect(config.circuitBreakerVixThreshold).toBe(25.0);
    expect(config.vixInputRange).toEqual([10.0, 80.0]);
    expect(config.ingest.portfolioJson).toBe(join(tempDir, 'data', 'scores_live.json'));
  });

  it('applies values from alerting.json over the defaults', () => {
    writeConfig(
      tempDir,
      JSON.stringify({ sell_threshold: 4, vix_input_range: [12, 60], ingest: { portfolio_csv: '/srv/scores.csv' } })
    );

    const config = loadAlertingConfig(tempDir);
    expect(config.sellThreshold).toBe(4);
    expect(config.reviewDeltaThreshold).toBe(0.8);
    expect(config.vixInputRange).toEqual([12, 60]);
    expect(config.ingest.portfolioCsv).toBe('/srv/scores.csv');
  });

  it('lets environment variables override the file', () => {
    writeConfig(tempDir, JSON.stringify({ sell_threshold: 4, risk_floor: 0.2 }));
    process.env.SELL_THRESHOLD = '6.5';
    process.env.CIRCUIT_BREAKER_VIX_THRESHOLD = '30';

    const config = loadAlertingConfig(tempDir);
    expect(config.sellThreshold).toBe(6.5);
    expect(config.riskFloor).toBe(0.2);
    expect(config.circuitBreakerVixThreshold).toBe(30);
  });

  it('rejects a non-numeric environment override', () => {
    process.env.RISK_FLOOR = 'tiny';
    expectConfigError(() => loadAlertingConfig(tempDir), 'config_invalid_env');
  });

  it('rejects a file that fails the schema', () => {
    writeConfig(tempDir, JSON.stringify({ sell_threshold: 'high' }));
    expectConfigError(() => loadAlertingConfig(tempDir), 'config_invalid_schema');
  });

  it('rejects a VIX range that is not a pair', () => {
    writeConfig(tempDir, JSON.stringify({ vix_input_range: [10, 40, 80] }));
    expectConfigError(() => loadAlertingConfig(tempDir), 'config_invalid_schema');
  });

  it('rejects unparseable JSON', () => {
    writeConfig(tempDir, '{ "sell_threshold": ');
    expectConfigError(() => loadAlertingConfig(tempDir), 'config_invalid_json');
  });

  it('merges explicit overrides last', () => {
    const merged = mergeOverrides(DEFAULT_ALERTING_CONFIG, {
      reviewDeltaThreshold: 0.5,
      ingest: { vixHistoryCsv: '/tmp/vix.csv' },
    });

    expect(merged.reviewDeltaThreshold).toBe(0.5);
    expect(merged.sellThreshold).toBe(5.0);
    expect(merged.ingest.vixHistoryCsv).toBe('/tmp/vix.csv');
    expect(merged.ingest.portfolioJson).toBe(DEFAULT_ALERTING_CONFIG.ingest.portfolioJson);
  });

  it('caches the project configuration until reset', () => {
    const first = getAlertingConfig();
    expect(getAlertingConfig()).toBe(first);
    expect(resolveAlertingConfig({ sellThreshold: 3 }).sellThreshold).toBe(3);

    resetConfig();
    expect(getAlertingConfig()).not.toBe(first);
  });
});
