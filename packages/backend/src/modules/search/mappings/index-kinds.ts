/**
 * Closed table of searchable entity categories.
 *
 * Each kind owns exactly one physical index (`<kind>_search_index`) and one
 * mapping template (`<kind>_index_mapping.json`) bundled in this directory.
 * Templates carry `settings` and `mappings`; create sends both, put-mapping
 * sends only `mappings`.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import path from 'path';
import { z } from 'zod';

import { ConfigurationError, UnknownEntityTypeError, errorMessage } from '../../../shared/errors';

export const INDEX_KINDS = [
  'table',
  'topic',
  'dashboard',
  'pipeline',
  'user',
  'team',
  'glossary',
  'mlmodel',
  'tag',
] as const;

export type IndexKind = (typeof INDEX_KINDS)[number];

export interface IndexDefinition {
  kind: IndexKind;
  indexName: string;
  mappingFile: string;
}

function define(kind: IndexKind): IndexDefinition {
  return { kind, indexName: `${kind}_search_index`, mappingFile: `${kind}_index_mapping.json` };
}

export const INDEX_DEFINITIONS: Readonly<Record<IndexKind, IndexDefinition>> = Object.freeze({
  table: define('table'),
  topic: define('topic'),
  dashboard: define('dashboard'),
  pipeline: define('pipeline'),
  user: define('user'),
  team: define('team'),
  glossary: define('glossary'),
  mlmodel: define('mlmodel'),
  tag: define('tag'),
});

// Keys are lower-cased entity type names. Glossary terms share the glossary index.
const ENTITY_TYPE_TO_KIND: ReadonlyMap<string, IndexKind> = new Map<string, IndexKind>([
  ['table', 'table'],
  ['topic', 'topic'],
  ['dashboard', 'dashboard'],
  ['pipeline', 'pipeline'],
  ['user', 'user'],
  ['team', 'team'],
  ['glossary', 'glossary'],
  ['glossaryterm', 'glossary'],
  ['mlmodel', 'mlmodel'],
  ['tag', 'tag'],
]);

export function isIndexKind(value: string): value is IndexKind {
  return INDEX_KINDS.some((kind) => kind === value);
}

/**
 * Resolves a domain entity type name (case-insensitive) to its index kind.
 * Throws UnknownEntityTypeError for names outside the table.
 */
export function indexKindFor(entityType: string): IndexKind {
  const kind = ENTITY_TYPE_TO_KIND.get(entityType.toLowerCase());
  if (!kind) {
    throw new UnknownEntityTypeError(entityType);
  }
  return kind;
}

export function indexNameFor(kind: IndexKind): string {
  return INDEX_DEFINITIONS[kind].indexName;
}

// ---------------------------------------------------------------------------
// Template loading
// ---------------------------------------------------------------------------

const mappingTemplateSchema = z.object({
  settings: z.record(z.unknown()).optional(),
  mappings: z.record(z.unknown()),
});

export type MappingTemplate = z.infer<typeof mappingTemplateSchema>;

export type MappingLoader = (kind: IndexKind) => MappingTemplate;

const MAPPINGS_DIR = path.dirname(fileURLToPath(import.meta.url));

/**
 * Reads and validates the bundled template for a kind.
 * A missing, unreadable or malformed file is a ConfigurationError.
 */
export function loadMappingTemplate(kind: IndexKind, dir: string = MAPPINGS_DIR): MappingTemplate {
  const file = path.join(dir, INDEX_DEFINITIONS[kind].mappingFile);

  let raw: string;
  try {
    raw = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Index mapping template not found for ${kind}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Index mapping template for ${kind} is not valid JSON: ${errorMessage(err)}`);
  }

  const result = mappingTemplateSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Index mapping template for ${kind} has no mappings section`);
  }
  return result.data;
}
