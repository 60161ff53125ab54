import type { ScoreRecord } from '@/types/portfolio';

export interface OverviewRow {
  symbol: string;
  company: string;
  sector: string;
  score: number;
  verdict: string;
}

export interface ScoreFilters {
  /** Omitted means every sector. */
  sectors?: readonly string[];
  minScore?: number;
  maxScore?: number;
}

export interface ScoreBounds {
  min: number;
  max: number;
}

export function buildOverviewRows(records: readonly ScoreRecord[]): OverviewRow[] {
  return records
    .map(({ symbol, company, sector, score, verdict }) => ({ symbol, company, sector, score, verdict }))
    .sort((a, b) => b.score - a.score);
}

export function listSectors(records: readonly ScoreRecord[]): string[] {
  return Array.from(new Set(records.map((record) => record.sector))).sort((a, b) =>
    a.localeCompare(b)
  );
}

export function scoreBounds(records: readonly ScoreRecord[]): ScoreBounds | null {
  if (records.length === 0) return null;
  const scores = records.map((record) => record.score);
  return { min: Math.min(...scores), max: Math.max(...scores) };
}

function passesFilters(record: ScoreRecord, filters: ScoreFilters): boolean {
  if (filters.sectors && !filters.sectors.includes(record.sector)) {
    return false;
  }
  if (filters.minScore !== undefined && record.score < filters.minScore) {
    return false;
  }
  if (filters.maxScore !== undefined && record.score > filters.maxScore) {
    return false;
  }
  return true;
}

export function filterScores(records: readonly ScoreRecord[], filters: ScoreFilters = {}): ScoreRecord[] {
  return records.filter((record) => passesFilters(record, filters)).sort((a, b) => a.score - b.score);
}

export function formatMetric(value: number | null): string {
  return value === null ? '—' : value.toFixed(2);
}
