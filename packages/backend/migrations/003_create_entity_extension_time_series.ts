import { Client } from 'pg';

// One row per (entity_fqn, extension). `timestamp` doubles as the
// compare-and-swap token for job record writes.
export async function up(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS entity_extension_time_series (
      entity_fqn VARCHAR(768) NOT NULL,
      extension  VARCHAR(256) NOT NULL,
      json       JSONB NOT NULL,
      timestamp  BIGINT NOT NULL,
      UNIQUE (entity_fqn, extension)
    );

    CREATE INDEX IF NOT EXISTS idx_entity_extension_time_series_timestamp
      ON entity_extension_time_series (entity_fqn, extension, timestamp DESC);
  `);
}

export async function down(client: Client): Promise<void> {
  await client.query(`DROP TABLE IF EXISTS entity_extension_time_series CASCADE;`);
}
