/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';

export type SchemaName = 'portfolio_table.v1' | 'vix_record.v1' | 'alerting_config.v1';

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

const schemaCache = new Map<SchemaName, SchemaObject>();

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaJson = readFileSync(`${SCHEMA_DIR}${schemaName}.schema.json`, 'utf-8');
  const schema: SchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
