/**
 * Score breakdown pivot: long-form (symbol, category, score_component) rows
 * reshaped into a sparse symbol × category matrix, with an explicit
 * fallback to the flat score list when the reshape is not possible.
 */

import { canonicalizeRow, isMissing } from '@/scoring/normalize';
import { parseNumeric } from '@/scoring/delta';
import type { RawRow, ScoreRecord } from '@/types/portfolio';

export interface BreakdownMatrix {
  symbols: string[];
  categories: string[];
  cells: Map<string, Map<string, number>>;
}

export interface BreakdownTriple {
  symbol: string;
  category: string;
  value: number;
}

export type PivotResult =
  | { status: 'available'; matrix: BreakdownMatrix }
  | { status: 'unavailable'; reason: string };

export interface FallbackEntry {
  symbol: string;
  sector: string;
  score: number;
}

export type BreakdownView =
  | { kind: 'matrix'; matrix: BreakdownMatrix }
  | {
      kind: 'fallback';
      reason: string;
      entries: FallbackEntry[];
      bySector: Map<string, FallbackEntry[]>;
    };

const PIVOT_COLUMNS = ['symbol', 'category', 'score_component'] as const;

function unavailable(reason: string): PivotResult {
  return { status: 'unavailable', reason };
}

function cellText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : String(value);
}

export function buildBreakdown(rows: readonly RawRow[]): PivotResult {
  if (rows.length === 0) {
    return unavailable('breakdown table is empty');
  }

  const symbols: string[] = [];
  const categories: string[] = [];
  const seenCategories = new Set<string>();
  const cells = new Map<string, Map<string, number>>();

  for (const [index, raw] of rows.entries()) {
    const row = canonicalizeRow(raw);

    for (const column of PIVOT_COLUMNS) {
      if (isMissing(row[column])) {
        return unavailable(`row ${index}: missing ${column}`);
      }
    }

    const symbol = cellText(row.symbol);
    const category = cellText(row.category);
    const value = parseNumeric(row.score_component);
    if (value === null) {
      return unavailable(`row ${index}: score_component is not numeric`);
    }

    let bySymbol = cells.get(symbol);
    if (!bySymbol) {
      bySymbol = new Map();
      cells.set(symbol, bySymbol);
      symbols.push(symbol);
    }

    const existing = bySymbol.get(category);
    if (existing !== undefined && existing !== value) {
      return unavailable(`conflicting values for (${symbol}, ${category}): ${existing} vs ${value}`);
    }
    bySymbol.set(category, value);

    if (!seenCategories.has(category)) {
      seenCategories.add(category);
      categories.push(category);
    }
  }

  return { status: 'available', matrix: { symbols, categories, cells } };
}

export function flattenBreakdown(matrix: BreakdownMatrix): BreakdownTriple[] {
  const triples: BreakdownTriple[] = [];
  for (const [symbol, byCategory] of matrix.cells) {
    for (const [category, value] of byCategory) {
      triples.push({ symbol, category, value });
    }
  }
  return triples;
}

/** Ascending by score; Array#sort is stable, so ties keep input order. */
export function buildScoreFallback(records: readonly ScoreRecord[]): FallbackEntry[] {
  return records
    .map((record) => ({ symbol: record.symbol, sector: record.sector, score: record.score }))
    .sort((a, b) => a.score - b.score);
}

export function groupBySector(entries: readonly FallbackEntry[]): Map<string, FallbackEntry[]> {
  const groups = new Map<string, FallbackEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.sector);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.sector, [entry]);
    }
  }
  return groups;
}

export function resolveBreakdown(
  rows: readonly RawRow[],
  records: readonly ScoreRecord[]
): BreakdownView {
  const pivot = buildBreakdown(rows);
  if (pivot.status === 'available') {
    return { kind: 'matrix', matrix: pivot.matrix };
  }

  const entries = buildScoreFallback(records);
  return {
    kind: 'fallback',
    reason: pivot.reason,
    entries,
    bySector: groupBySector(entries),
  };
}
