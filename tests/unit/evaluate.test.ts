import { describe, expect, it } from 'vitest';
import { evaluatePortfolio } from '@/run/evaluate';
import { DEFAULT_ALERTING_CONFIG, mergeOverrides } from '@/core/config';
import { IngestError } from '@/core/errors';

const config = DEFAULT_ALERTING_CONFIG;

describe('evaluatePortfolio', () => {
  it('runs normalization, deltas, alerts, aggregates and the regime in one pass', () => {
    const evaluation = evaluatePortfolio(
      [
        { Symbol: 'AAPL', Sector: 'Technology', Score: 4.5, Prev_Score: 5.0, Weight: 0.25 },
        { Symbol: 'MSFT', Sector: 'Technology', Score: 7.0, Prev_Score: 6.0, Weight: 0.2, Score_Change: 0 },
      ],
      { config, currentVix: 30 }
    );

    expect(evaluation.records.map((record) => record.score_change)).toEqual([-0.5, 1]);
    expect(evaluation.alerts.map((alert) => alert.message)).toEqual([
      'AAPL: Score < 5.0 → SELL signal',
      'MSFT: Δ Score +1.00 → Review position',
    ]);
    expect(evaluation.alertSummary.stable).toBe(false);
    expect(evaluation.summary.averageScore).toBe(5.75);
    expect(evaluation.summary.riskAdjustedRatio).toBe(5.75 / 0.1);
    expect(evaluation.summary.sectorAllocation.get('Technology')).toBeCloseTo(0.45);
    expect(evaluation.regime?.regime).toBe('CIRCUIT_BREAKER_ACTIVE');
    expect(evaluation.diagnostics).toEqual([]);
  });

  it('excludes invalid rows and reports them alongside the results', () => {
    const evaluation = evaluatePortfolio(
      [
        { symbol: 'AAPL', score: 4.5 },
        { symbol: 'BAD', score: 'unknown' },
        { symbol: 'KO', score: 6 },
      ],
      { config }
    );

    expect(evaluation.records).toHaveLength(2);
    expect(evaluation.diagnostics).toHaveLength(1);
    expect(evaluation.diagnostics[0].symbol).toBe('BAD');
    expect(evaluation.alerts.map((alert) => alert.symbol)).toEqual(['AAPL', 'KO']);
  });

  it('keeps excluded rows out of the averages and the sector allocation', () => {
    const evaluation = evaluatePortfolio(
      [
        { symbol: 'AAPL', sector: 'Technology', score: 4, weight: 0.3 },
        { symbol: 'BAD', sector: 'Energy', score: 'n/a', weight: 0.5 },
        { symbol: 'KO', sector: 'Technology', score: 6, weight: 0.2 },
      ],
      { config }
    );

    expect(evaluation.summary.recordCount).toBe(2);
    expect(evaluation.summary.averageScore).toBe(5);
    expect(evaluation.summary.totalWeight).toBeCloseTo(0.5);
    expect(Array.from(evaluation.summary.sectorAllocation.keys())).toEqual(['Technology']);
    expect(evaluation.summary.sectorAllocation.get('Technology')).toBeCloseTo(0.5);
  });

  it('reports an empty table without failing', () => {
    const evaluation = evaluatePortfolio([], { config, currentVix: 18 });

    expect(evaluation.summary.empty).toBe(true);
    expect(evaluation.summary.averageScore).toBeNull();
    expect(evaluation.summary.sectorAllocation.size).toBe(0);
    expect(evaluation.alertSummary.headline).toBe('No alerts – portfolio stable.');
    expect(evaluation.regime?.regime).toBe('NORMAL_TRADING');
  });

  it('leaves the regime out when no VIX reading is given', () => {
    expect(evaluatePortfolio([{ symbol: 'KO', score: 6, prev_score: 6 }], { config }).regime).toBeNull();
  });

  it('applies overridden thresholds', () => {
    const evaluation = evaluatePortfolio([{ symbol: 'KO', score: 6, prev_score: 6 }], {
      config: mergeOverrides(config, { sellThreshold: 6.5 }),
    });
    expect(evaluation.alerts[0].message).toBe('KO: Score < 6.5 → SELL signal');
  });

  it('rejects input that is not a table', () => {
    expect(() => evaluatePortfolio({ symbol: 'AAPL' }, { config })).toThrow(IngestError);
    expect(() => evaluatePortfolio('AAPL,4.5', { config })).toThrow(IngestError);
    expect(() => evaluatePortfolio([1, 2], { config })).toThrow(IngestError);
  });
});
