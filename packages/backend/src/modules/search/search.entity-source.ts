import { z } from 'zod';

import { exec } from '../../shared/db';
import { RemoteIOError, ValidationError, errorMessage } from '../../shared/errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Stored entity JSON after field projection. */
export type CatalogEntity = Record<string, unknown>;

export type IncludeFilter = 'all' | 'non-deleted' | 'deleted';

export interface ListOptions {
  fields: string[];
  include: IncludeFilter;
  limit: number;
  /** Opaque cursor from the previous page; null for the first page. */
  after: string | null;
}

export interface EntityPage {
  data: CatalogEntity[];
  paging: {
    /** Rows matching the include filter, across all pages. */
    total: number;
    after: string | null;
  };
}

export interface EntitySource {
  allowedFields(entityType: string): string[];
  listAfter(entityType: string, options: ListOptions): Promise<EntityPage>;
}

interface EntityTableDefinition {
  table: string;
  fields: string[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const BASE_FIELDS = ['id', 'name', 'fullyQualifiedName', 'displayName', 'description', 'deleted'];

// Keys are lower-cased entity type names
const ENTITY_TABLES: Readonly<Record<string, EntityTableDefinition>> = {
  table: {
    table: 'table_entity',
    fields: ['tableType', 'columns', 'owner', 'tags', 'service', 'database', 'databaseSchema', 'followers', 'updatedAt'],
  },
  topic: {
    table: 'topic_entity',
    fields: ['owner', 'tags', 'service', 'partitions', 'messageSchema', 'followers', 'updatedAt'],
  },
  dashboard: {
    table: 'dashboard_entity',
    fields: ['owner', 'tags', 'service', 'charts', 'followers', 'updatedAt'],
  },
  pipeline: {
    table: 'pipeline_entity',
    fields: ['owner', 'tags', 'service', 'tasks', 'followers', 'updatedAt'],
  },
  user: {
    table: 'user_entity',
    fields: ['email', 'isAdmin', 'teams', 'roles', 'updatedAt'],
  },
  team: {
    table: 'team_entity',
    fields: ['owner', 'users', 'defaultRoles', 'updatedAt'],
  },
  glossary: {
    table: 'glossary_entity',
    fields: ['owner', 'tags', 'reviewers', 'updatedAt'],
  },
  glossaryterm: {
    table: 'glossary_term_entity',
    fields: ['owner', 'tags', 'glossary', 'synonyms', 'status', 'reviewers', 'updatedAt'],
  },
  mlmodel: {
    table: 'ml_model_entity',
    fields: ['owner', 'tags', 'service', 'algorithm', 'mlFeatures', 'followers', 'updatedAt'],
  },
  tag: {
    table: 'tag',
    fields: ['classification', 'usageCount', 'updatedAt'],
  },
};

const INCLUDE_CLAUSES: Record<IncludeFilter, string> = {
  all: 'TRUE',
  'non-deleted': 'deleted = FALSE',
  deleted: 'deleted = TRUE',
};

const storedEntitySchema = z.record(z.unknown());

interface EntityRow {
  id: string;
  name: string;
  json: unknown;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function encodeCursor(id: string): string {
  return Buffer.from(id, 'utf-8').toString('base64url');
}

export function decodeCursor(cursor: string): string {
  const id = Buffer.from(cursor, 'base64url').toString('utf-8');
  if (id.length === 0 || encodeCursor(id) !== cursor) {
    throw new ValidationError('Invalid paging cursor');
  }
  return id;
}

function definitionFor(entityType: string): EntityTableDefinition {
  const definition = ENTITY_TABLES[entityType.toLowerCase()];
  if (!definition) {
    throw new ValidationError(`Unknown entity type ${entityType}`);
  }
  return definition;
}

function project(row: EntityRow, fields: string[]): CatalogEntity {
  const parsed = storedEntitySchema.safeParse(row.json);
  const stored = parsed.success ? parsed.data : {};
  const entity: CatalogEntity = {};
  for (const field of [...BASE_FIELDS, ...fields]) {
    if (field in stored) entity[field] = stored[field];
  }
  entity.id = row.id;
  entity.name = row.name;
  return entity;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Pages entities out of their per-type PostgreSQL tables in id order.
 * Cursors encode the last id of a page.
 */
export function createEntitySource(): EntitySource {
  return {
    allowedFields(entityType) {
      return [...definitionFor(entityType).fields];
    },

    async listAfter(entityType, options) {
      const { table, fields: allowed } = definitionFor(entityType);

      const unknown = options.fields.filter((f) => !allowed.includes(f) && !BASE_FIELDS.includes(f));
      if (unknown.length > 0) {
        throw new ValidationError(`Invalid fields for ${entityType}: ${unknown.join(', ')}`);
      }

      const where = INCLUDE_CLAUSES[options.include];
      const afterId = options.after ? decodeCursor(options.after) : null;

      try {
        const params: unknown[] = [options.limit + 1];
        let sql = `SELECT id, name, json FROM ${table} WHERE ${where}`;
        if (afterId !== null) {
          params.push(afterId);
          sql += ' AND id > $2';
        }
        sql += ' ORDER BY id LIMIT $1';

        const [rowsResult, countResult] = await Promise.all([
          exec<EntityRow>(sql, params),
          exec<{ total: number }>(`SELECT COUNT(*)::int AS total FROM ${table} WHERE ${where}`, []),
        ]);

        const rows = rowsResult.rows;
        const hasMore = rows.length > options.limit;
        const page = hasMore ? rows.slice(0, options.limit) : rows;
        const last = page[page.length - 1];

        return {
          data: page.map((row) => project(row, options.fields)),
          paging: {
            total: countResult.rows[0]?.total ?? 0,
            after: hasMore && last ? encodeCursor(last.id) : null,
          },
        };
      } catch (err) {
        throw new RemoteIOError(`Listing ${entityType} entities failed: ${errorMessage(err)}`, err);
      }
    },
  };
}
