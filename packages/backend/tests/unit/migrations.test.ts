import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Client } from 'pg';
import * as users from '../../migrations/001_create_users';
import * as entityTables from '../../migrations/002_create_entity_tables';
import * as timeSeries from '../../migrations/003_create_entity_extension_time_series';

function createMockClient(): Client {
  return {
    query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
  } as unknown as Client;
}

function sqlOf(client: Client, call = 0): string {
  return (client.query as ReturnType<typeof vi.fn>).mock.calls[call][0] as string;
}

describe('migrations', () => {
  let client: Client;

  beforeEach(() => {
    client = createMockClient();
  });

  describe('001_create_users', () => {
    it('creates users with a unique name and an admin flag', async () => {
      await users.up(client);

      const sql = sqlOf(client);
      expect(sql).toContain('CREATE TABLE IF NOT EXISTS users');
      expect(sql).toContain('name VARCHAR(255) NOT NULL UNIQUE');
      expect(sql).toContain('is_admin BOOLEAN NOT NULL DEFAULT FALSE');
    });

    it('drops users with CASCADE', async () => {
      await users.down(client);

      expect(sqlOf(client)).toBe('DROP TABLE IF EXISTS users CASCADE;');
    });
  });

  describe('002_create_entity_tables', () => {
    it('creates one table per entity type in a single statement batch', async () => {
      await entityTables.up(client);

      expect(client.query).toHaveBeenCalledOnce();
      const sql = sqlOf(client);
      for (const table of entityTables.ENTITY_TABLES) {
        expect(sql).toContain(`CREATE TABLE IF NOT EXISTS ${table} (`);
        expect(sql).toContain(`idx_${table}_deleted_id`);
      }
      expect(sql).toContain('json JSONB NOT NULL');
      expect(sql).toContain('deleted BOOLEAN NOT NULL DEFAULT FALSE');
    });

    it('drops every entity table', async () => {
      await entityTables.down(client);

      const sql = sqlOf(client);
      expect(sql).toContain('DROP TABLE IF EXISTS table_entity CASCADE;');
      expect(sql).toContain('DROP TABLE IF EXISTS tag CASCADE;');
      expect(sql.split('\n')).toHaveLength(entityTables.ENTITY_TABLES.length);
    });
  });

  describe('003_create_entity_extension_time_series', () => {
    it('keeps one row per entity and extension', async () => {
      await timeSeries.up(client);

      const sql = sqlOf(client);
      expect(sql).toContain('CREATE TABLE IF NOT EXISTS entity_extension_time_series');
      expect(sql).toContain('timestamp  BIGINT NOT NULL');
      expect(sql).toContain('UNIQUE (entity_fqn, extension)');
    });

    it('completes a full up/down/up cycle', async () => {
      await timeSeries.up(client);
      await timeSeries.down(client);
      await timeSeries.up(client);

      expect(client.query).toHaveBeenCalledTimes(3);
      expect(sqlOf(client, 1)).toBe('DROP TABLE IF EXISTS entity_extension_time_series CASCADE;');
    });
  });
});
