/**
 * Portfolio aggregates: sector allocation, mean score and the
 * Sharpe-like estimate (mean score over mean risk, floored).
 */

import { EmptyInputError, isEmptyInputError } from '@/core/errors';
import { DEFAULT_ALERTING_CONFIG } from '@/core/config';
import type { ScoreRecord } from '@/types/portfolio';

export type SectorAllocation = Map<string, number>;

export interface PortfolioSummary {
  empty: boolean;
  recordCount: number;
  averageScore: number | null;
  averageRisk: number | null;
  riskAdjustedRatio: number | null;
  sectorAllocation: SectorAllocation;
  totalWeight: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function sectorAllocation(records: readonly ScoreRecord[]): SectorAllocation {
  const allocation: SectorAllocation = new Map();
  for (const record of records) {
    allocation.set(record.sector, (allocation.get(record.sector) ?? 0) + record.weight);
  }
  return allocation;
}

export function averageScore(records: readonly ScoreRecord[]): number {
  if (records.length === 0) {
    throw new EmptyInputError('averageScore');
  }
  return mean(records.map((record) => record.score));
}

/** Mean of `risk` over records that supply it; 0 when none do. */
export function averageRisk(records: readonly ScoreRecord[]): number {
  const risks = records.flatMap((record) => (record.risk === null ? [] : [record.risk]));
  return risks.length > 0 ? mean(risks) : 0;
}

export function riskAdjustedRatio(
  records: readonly ScoreRecord[],
  riskFloor: number = DEFAULT_ALERTING_CONFIG.riskFloor
): number {
  if (records.length === 0) {
    throw new EmptyInputError('riskAdjustedRatio');
  }
  return averageScore(records) / Math.max(averageRisk(records), riskFloor);
}

export function summarizePortfolio(
  records: readonly ScoreRecord[],
  riskFloor: number = DEFAULT_ALERTING_CONFIG.riskFloor
): PortfolioSummary {
  const allocation = sectorAllocation(records);
  const totalWeight = records.reduce((sum, record) => sum + record.weight, 0);

  try {
    return {
      empty: false,
      recordCount: records.length,
      averageScore: averageScore(records),
      averageRisk: averageRisk(records),
      riskAdjustedRatio: riskAdjustedRatio(records, riskFloor),
      sectorAllocation: allocation,
      totalWeight,
    };
  } catch (error) {
    if (!isEmptyInputError(error)) {
      throw error;
    }
    return {
      empty: true,
      recordCount: 0,
      averageScore: null,
      averageRisk: null,
      riskAdjustedRatio: null,
      sectorAllocation: allocation,
      totalWeight,
    };
  }
}
