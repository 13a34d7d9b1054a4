import { Client } from 'pg';

export const ENTITY_TABLES = [
  'table_entity',
  'topic_entity',
  'dashboard_entity',
  'pipeline_entity',
  'user_entity',
  'team_entity',
  'glossary_entity',
  'glossary_term_entity',
  'ml_model_entity',
  'tag',
] as const;

function createTable(table: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${table} (
      id VARCHAR(36) PRIMARY KEY,
      name VARCHAR(256) NOT NULL,
      json JSONB NOT NULL,
      deleted BOOLEAN NOT NULL DEFAULT FALSE
    );

    CREATE INDEX IF NOT EXISTS idx_${table}_deleted_id ON ${table} (deleted, id);
  `;
}

export async function up(client: Client): Promise<void> {
  await client.query(ENTITY_TABLES.map(createTable).join('\n'));
}

export async function down(client: Client): Promise<void> {
  await client.query(
    ENTITY_TABLES.map((table) => `DROP TABLE IF EXISTS ${table} CASCADE;`).join('\n'),
  );
}
