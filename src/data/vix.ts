import { existsSync, readFileSync } from 'fs';
import { getAlertingConfig } from '@/core/config';
import { parseNumeric } from '@/scoring/delta';
import { canonicalizeRow } from '@/scoring/normalize';
import { validateVixRecord } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { parseCsvTable } from './portfolio';
import type { VixRecord } from '@/types/portfolio';

const logger = createChildLogger('vix_ingest');

export function parseVixHistory(content: string): VixRecord[] {
  const records: VixRecord[] = [];
  let skipped = 0;

  for (const raw of parseCsvTable(content)) {
    const row = canonicalizeRow(raw);
    const result = validateVixRecord({ date: row.date, vix: parseNumeric(row.vix) ?? row.vix });
    if (result.valid) {
      records.push(result.data);
    } else {
      skipped += 1;
    }
  }

  if (skipped > 0) {
    logger.warn({ skipped }, 'Skipped malformed VIX history rows');
  }
  return records;
}

/** Returns null when no history file exists; the history is optional. */
export function loadVixHistory(path: string = getAlertingConfig().ingest.vixHistoryCsv): VixRecord[] | null {
  if (!existsSync(path)) {
    logger.info({ path }, 'No VIX history file');
    return null;
  }
  return parseVixHistory(readFileSync(path, 'utf-8'));
}
