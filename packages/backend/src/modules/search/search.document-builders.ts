import { z } from 'zod';

import type { CatalogEntity } from './search.entity-source';
import { UnsupportedEntityTypeError } from '../../shared/errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SuggestInput {
  input: string;
  weight: number;
}

/** OpenSearch document shape shared by every index mapping. */
export interface SearchDocument {
  id: string;
  name: string;
  display_name: string;
  fqn: string;
  description: string | null;
  entity_type: string;
  deleted: boolean;
  tags: string[];
  tier: string | null;
  owner: string | null;
  updated_at: number | null;
  suggest: SuggestInput[];
  [field: string]: unknown;
}

export type DocumentBuilder = (entityType: string, entity: CatalogEntity) => SearchDocument;

export interface DocumentBuilderRegistry {
  register(entityType: string, builder: DocumentBuilder): void;
  has(entityType: string): boolean;
  /** Throws UnsupportedEntityTypeError when no builder is registered for the type. */
  build(entityType: string, entity: CatalogEntity): SearchDocument;
}

// ---------------------------------------------------------------------------
// Entity field schemas
// ---------------------------------------------------------------------------

const reference = z.object({ name: z.string() }).passthrough();

const named = z
  .object({
    name: z.string(),
    displayName: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const baseEntitySchema = z
  .object({
    id: z.string(),
    name: z.string(),
    fullyQualifiedName: z.string().optional(),
    displayName: z.string().optional(),
    description: z.string().optional(),
    deleted: z.boolean().optional(),
    tags: z.array(z.object({ tagFQN: z.string() }).passthrough()).optional(),
    owner: reference.optional(),
    updatedAt: z.number().optional(),
  })
  .passthrough();

interface ColumnLike {
  name: string;
  description?: string;
  children?: ColumnLike[];
}

const columnSchema: z.ZodType<ColumnLike> = z.lazy(() =>
  z.object({
    name: z.string(),
    description: z.string().optional(),
    children: z.array(columnSchema).optional(),
  }),
);

const tableSchema = baseEntitySchema.extend({
  tableType: z.string().optional(),
  service: reference.optional(),
  database: reference.optional(),
  databaseSchema: reference.optional(),
  columns: z.array(columnSchema).default([]),
});

const topicSchema = baseEntitySchema.extend({
  service: reference.optional(),
  partitions: z.number().int().optional(),
  messageSchema: z
    .object({
      schemaType: z.string().optional(),
      schemaFields: z.array(columnSchema).default([]),
    })
    .optional(),
});

const dashboardSchema = baseEntitySchema.extend({
  service: reference.optional(),
  charts: z.array(named).default([]),
});

const pipelineSchema = baseEntitySchema.extend({
  service: reference.optional(),
  tasks: z.array(named).default([]),
});

const userSchema = baseEntitySchema.extend({
  email: z.string().optional(),
  isAdmin: z.boolean().optional(),
  teams: z.array(reference).default([]),
});

const glossarySchema = baseEntitySchema.extend({
  glossary: reference.optional(),
  synonyms: z.array(z.string()).default([]),
  status: z.string().optional(),
});

const mlModelSchema = baseEntitySchema.extend({
  service: reference.optional(),
  algorithm: z.string().optional(),
  mlFeatures: z.array(reference).default([]),
});

const tagSchema = baseEntitySchema.extend({
  classification: reference.optional(),
  usageCount: z.number().int().optional(),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TIER_MARKER = 'tier';

/** Splits tag labels into plain tags and the tier label. Only the first match is the tier. */
export function splitTier(tagFqns: string[]): { tags: string[]; tier: string | null } {
  let tier: string | null = null;
  const tags: string[] = [];
  for (const fqn of tagFqns) {
    if (tier === null && fqn.toLowerCase().includes(TIER_MARKER)) {
      tier = fqn;
    } else {
      tags.push(fqn);
    }
  }
  return { tags, tier };
}

/** Depth-first names of nested columns or schema fields, joined with dots. */
export function flattenColumns(
  columns: ColumnLike[],
  parent?: string,
): Array<{ name: string; description: string | null }> {
  return columns.flatMap((column) => {
    const name = parent ? `${parent}.${column.name}` : column.name;
    return [
      { name, description: column.description ?? null },
      ...flattenColumns(column.children ?? [], name),
    ];
  });
}

function baseDocument(entityType: string, entity: z.infer<typeof baseEntitySchema>): SearchDocument {
  const fqn = entity.fullyQualifiedName ?? entity.name;
  const { tags, tier } = splitTier((entity.tags ?? []).map((tag) => tag.tagFQN));
  return {
    id: entity.id,
    name: entity.name,
    display_name: entity.displayName ?? entity.name,
    fqn,
    description: entity.description ?? null,
    entity_type: entityType,
    deleted: entity.deleted ?? false,
    tags,
    tier,
    owner: entity.owner?.name ?? null,
    updated_at: entity.updatedAt ?? null,
    suggest: [
      { input: fqn, weight: 5 },
      { input: entity.name, weight: 10 },
    ],
  };
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

const buildTable: DocumentBuilder = (entityType, entity) => {
  const table = tableSchema.parse(entity);
  const columns = flattenColumns(table.columns);
  return {
    ...baseDocument(entityType, table),
    service: table.service?.name ?? null,
    database: table.database?.name ?? null,
    database_schema: table.databaseSchema?.name ?? null,
    table_type: table.tableType ?? null,
    column_names: columns.map((c) => c.name),
    column_descriptions: columns.flatMap((c) => (c.description ? [c.description] : [])),
  };
};

const buildTopic: DocumentBuilder = (entityType, entity) => {
  const topic = topicSchema.parse(entity);
  return {
    ...baseDocument(entityType, topic),
    service: topic.service?.name ?? null,
    partitions: topic.partitions ?? null,
    schema_type: topic.messageSchema?.schemaType ?? null,
    schema_fields: flattenColumns(topic.messageSchema?.schemaFields ?? []).map((f) => f.name),
  };
};

const buildDashboard: DocumentBuilder = (entityType, entity) => {
  const dashboard = dashboardSchema.parse(entity);
  return {
    ...baseDocument(entityType, dashboard),
    service: dashboard.service?.name ?? null,
    chart_names: dashboard.charts.map((chart) => chart.displayName ?? chart.name),
    chart_descriptions: dashboard.charts.flatMap((chart) => (chart.description ? [chart.description] : [])),
  };
};

const buildPipeline: DocumentBuilder = (entityType, entity) => {
  const pipeline = pipelineSchema.parse(entity);
  return {
    ...baseDocument(entityType, pipeline),
    service: pipeline.service?.name ?? null,
    task_names: pipeline.tasks.map((task) => task.displayName ?? task.name),
    task_descriptions: pipeline.tasks.flatMap((task) => (task.description ? [task.description] : [])),
  };
};

const buildUser: DocumentBuilder = (entityType, entity) => {
  const user = userSchema.parse(entity);
  return {
    ...baseDocument(entityType, user),
    email: user.email ?? null,
    is_admin: user.isAdmin ?? false,
    teams: user.teams.map((team) => team.name),
  };
};

// Teams are fetched with name and display name only
const buildTeam: DocumentBuilder = (entityType, entity) =>
  baseDocument(entityType, baseEntitySchema.parse(entity));

const buildGlossary: DocumentBuilder = (entityType, entity) => {
  const glossary = glossarySchema.parse(entity);
  return {
    ...baseDocument(entityType, glossary),
    glossary_name: glossary.glossary?.name ?? glossary.name,
    synonyms: glossary.synonyms,
    status: glossary.status ?? null,
  };
};

const buildMlModel: DocumentBuilder = (entityType, entity) => {
  const model = mlModelSchema.parse(entity);
  return {
    ...baseDocument(entityType, model),
    service: model.service?.name ?? null,
    algorithm: model.algorithm ?? null,
    ml_features: model.mlFeatures.map((feature) => feature.name),
  };
};

const buildTag: DocumentBuilder = (entityType, entity) => {
  const tag = tagSchema.parse(entity);
  return {
    ...baseDocument(entityType, tag),
    classification: tag.classification?.name ?? null,
    usage_count: tag.usageCount ?? 0,
  };
};

export const DEFAULT_BUILDERS: ReadonlyArray<[string, DocumentBuilder]> = [
  ['table', buildTable],
  ['topic', buildTopic],
  ['dashboard', buildDashboard],
  ['pipeline', buildPipeline],
  ['user', buildUser],
  ['team', buildTeam],
  ['glossary', buildGlossary],
  ['glossaryTerm', buildGlossary],
  ['mlmodel', buildMlModel],
  ['tag', buildTag],
];

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export function createDocumentBuilderRegistry(
  builders: ReadonlyArray<[string, DocumentBuilder]> = DEFAULT_BUILDERS,
): DocumentBuilderRegistry {
  const registry = new Map<string, DocumentBuilder>();

  function register(entityType: string, builder: DocumentBuilder): void {
    registry.set(entityType.toLowerCase(), builder);
  }

  for (const [entityType, builder] of builders) {
    register(entityType, builder);
  }

  return {
    register,

    has(entityType) {
      return registry.has(entityType.toLowerCase());
    },

    build(entityType, entity) {
      const builder = registry.get(entityType.toLowerCase());
      if (!builder) {
        throw new UnsupportedEntityTypeError(entityType);
      }
      return builder(entityType, entity);
    },
  };
}
