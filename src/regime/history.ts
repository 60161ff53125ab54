import { DEFAULT_ALERTING_CONFIG } from '@/core/config';
import type { VixRecord } from '@/types/portfolio';

export interface VixHistorySummary {
  points: VixRecord[];
  threshold: number;
  latest: VixRecord | null;
  peak: VixRecord | null;
  breaches: VixRecord[];
}

/** Display-only view of the VIX history against the breaker threshold. */
export function summarizeVixHistory(
  records: readonly VixRecord[],
  threshold: number = DEFAULT_ALERTING_CONFIG.circuitBreakerVixThreshold
): VixHistorySummary {
  const points = [...records].sort((a, b) => a.date.localeCompare(b.date));

  let peak: VixRecord | null = null;
  for (const point of points) {
    if (peak === null || point.vix > peak.vix) {
      peak = point;
    }
  }

  return {
    points,
    threshold,
    latest: points.length > 0 ? points[points.length - 1] : null,
    peak,
    breaches: points.filter((point) => point.vix > threshold),
  };
}
