/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
}

export type SchemaName = 'analysis.v1' | 'universe.v1';

const schemaCache = new Map<string, Schema>();

export function loadSchema(schemaName: SchemaName, projectRoot: string = process.cwd()): Schema {
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const cached = schemaCache.get(schemaPath);
  if (cached) {
    return cached;
  }

  const schema = JSON.parse(readFileSync(schemaPath, 'utf-8')) as Schema;
  schemaCache.set(schemaPath, schema);
  return schema;
}
