import { readFileSync } from 'node:fs';
import { relationsFileSchema, suppressArraySchema } from './schema.js';
import type { RelationsFile } from './schema.js';
import { isRecord } from '../../util/index.js';

/** Result of parsing a relations file. */
export interface ParsedRelations {
  readonly relations: RelationsFile;
  readonly suppress: readonly string[];
}

/**
 * Parse and validate a relations JSON file.
 * Returns the validated relations and suppress list, or throws on invalid input.
 */
export function parseRelationsFile(filePath: string): ParsedRelations {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parseRelations(raw);
}

/**
 * Validate an already decoded relations document.
 */
export function parseRelations(raw: unknown): ParsedRelations {
  // Extract suppress array before validating the rest as relation record
  let suppress: readonly string[] = [];
  let relationData: unknown = raw;
  if (isRecord(raw) && 'suppress' in raw) {
    suppress = suppressArraySchema.parse(raw['suppress']);
    const { suppress: _suppress, ...rest } = raw;
    relationData = rest;
  }

  const relations = relationsFileSchema.parse(relationData);
  return { relations, suppress };
}
