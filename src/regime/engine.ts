import { DEFAULT_ALERTING_CONFIG, type AlertingConfig, type VixRange } from '@/core/config';

export type RiskRegime = 'CIRCUIT_BREAKER_ACTIVE' | 'NORMAL_TRADING';

export interface RiskRegimeResult {
  regime: RiskRegime;
  vix: number;
  threshold: number;
  message: string;
  within_advisory_range: boolean;
}

const REGIME_MESSAGES: Record<RiskRegime, string> = {
  CIRCUIT_BREAKER_ACTIVE: 'Circuit Breaker Active – Freeze Rebalancing',
  NORMAL_TRADING: 'Normal trading regime',
};

/**
 * Strictly above the threshold trips the breaker. Out-of-range readings are
 * classified as given; clamping is the caller's job (see clampVixInput).
 */
export function evaluateRiskRegime(
  currentVix: number,
  threshold: number = DEFAULT_ALERTING_CONFIG.circuitBreakerVixThreshold
): RiskRegime {
  return currentVix > threshold ? 'CIRCUIT_BREAKER_ACTIVE' : 'NORMAL_TRADING';
}

export function describeRiskRegime(
  currentVix: number,
  config: Pick<AlertingConfig, 'circuitBreakerVixThreshold' | 'vixInputRange'> = DEFAULT_ALERTING_CONFIG
): RiskRegimeResult {
  const threshold = config.circuitBreakerVixThreshold;
  const regime = evaluateRiskRegime(currentVix, threshold);
  const [low, high] = config.vixInputRange;

  return {
    regime,
    vix: currentVix,
    threshold,
    message: REGIME_MESSAGES[regime],
    within_advisory_range: currentVix >= low && currentVix <= high,
  };
}

export function clampVixInput(
  value: number,
  range: VixRange = DEFAULT_ALERTING_CONFIG.vixInputRange
): number {
  const [low, high] = range;
  return Math.min(high, Math.max(low, value));
}
