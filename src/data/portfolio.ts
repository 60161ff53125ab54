/**
 * Read-only ingest of the portfolio scoring table.
 * The JSON document is preferred; the CSV flat file is the fallback.
 */

import { existsSync, readFileSync } from 'fs';
import Papa from 'papaparse';
import { getAlertingConfig } from '@/core/config';
import { IngestError } from '@/core/errors';
import { validateTable } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { RawRow } from '@/types/portfolio';

const logger = createChildLogger('portfolio_ingest');

export type TableSource = 'json' | 'csv';

export interface LoadedTable {
  source: TableSource;
  path: string;
  rows: RawRow[];
}

export interface LoadTableOptions {
  jsonPath?: string;
  csvPath?: string;
}

/** Cells stay strings: tickers such as `0700` or `TRUE` must survive as written. */
export function parseCsvTable(content: string): RawRow[] {
  const result = Papa.parse<RawRow>(content, {
    header: true,
    skipEmptyLines: true,
  });

  if (result.errors.length > 0) {
    logger.warn(
      { errors: result.errors.slice(0, 5).map((e) => `row ${e.row}: ${e.message}`) },
      'CSV parsed with row errors'
    );
  }

  return result.data;
}

function readJsonTable(path: string): RawRow[] | null {
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn({ path, error: error instanceof Error ? error.message : String(error) }, 'Invalid JSON table, trying CSV');
    return null;
  }

  const validation = validateTable(parsed);
  if (!validation.valid) {
    logger.warn({ path, errors: validation.errors }, 'JSON document is not a table, trying CSV');
    return null;
  }
  return validation.data;
}

export function loadPortfolioTable(options: LoadTableOptions = {}): LoadedTable {
  const jsonPath = options.jsonPath ?? getAlertingConfig().ingest.portfolioJson;
  const csvPath = options.csvPath ?? getAlertingConfig().ingest.portfolioCsv;

  const jsonRows = readJsonTable(jsonPath);
  if (jsonRows) {
    logger.debug({ path: jsonPath, rows: jsonRows.length }, 'Loaded portfolio table from JSON');
    return { source: 'json', path: jsonPath, rows: jsonRows };
  }

  if (!existsSync(csvPath)) {
    throw new IngestError('ingest_unavailable', `no readable table at ${jsonPath} or ${csvPath}`);
  }

  const rows = parseCsvTable(readFileSync(csvPath, 'utf-8'));
  logger.debug({ path: csvPath, rows: rows.length }, 'Loaded portfolio table from CSV');
  return { source: 'csv', path: csvPath, rows };
}
