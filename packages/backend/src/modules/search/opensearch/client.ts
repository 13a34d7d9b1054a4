import { Client } from '@opensearch-project/opensearch';
import { readFileSync } from 'fs';
import { z } from 'zod';

export interface OpenSearchConfig {
  nodeUrls: string[];
  username?: string;
  password?: string;
  requestTimeoutMs: number;
  maxRetries: number;
  sslCertPath?: string;
}

export interface ClusterHealth {
  status: 'green' | 'yellow' | 'red';
  numberOfNodes: number;
  activeShards: number;
  unassignedShards: number;
  clusterName: string;
}

const clusterHealthSchema = z.object({
  status: z.enum(['green', 'yellow', 'red']),
  number_of_nodes: z.number(),
  active_shards: z.number(),
  unassigned_shards: z.number(),
  cluster_name: z.string(),
});

let client: Client | null = null;

/**
 * Initializes the process-wide OpenSearch client. Call once at startup and
 * hand the returned instance to the collaborators that need it.
 */
export function initOpenSearch(config: OpenSearchConfig): Client {
  if (!client) {
    const ssl = config.sslCertPath
      ? { ca: readFileSync(config.sslCertPath, 'utf-8') }
      : undefined;

    const auth =
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined;

    client = new Client({
      nodes: config.nodeUrls,
      auth,
      ssl,
      requestTimeout: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
    });
  }
  return client;
}

/**
 * Returns the current OpenSearch client instance.
 * Throws if the client has not been initialized via initOpenSearch().
 */
export function getOpenSearch(): Client {
  if (!client) {
    throw new Error('OpenSearch client not initialized. Call initOpenSearch() first.');
  }
  return client;
}

export async function healthCheck(os: Client = getOpenSearch()): Promise<ClusterHealth> {
  const { body } = await os.cluster.health();
  const health = clusterHealthSchema.parse(body);
  return {
    status: health.status,
    numberOfNodes: health.number_of_nodes,
    activeShards: health.active_shards,
    unassignedShards: health.unassigned_shards,
    clusterName: health.cluster_name,
  };
}

export async function closeOpenSearch(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
  }
}

/**
 * Replaces the client instance, useful for testing with a mock.
 */
export function setOpenSearch(customClient: Client): void {
  client = customClient;
}

/**
 * Resets the client to null, useful for testing.
 */
export function resetOpenSearch(): void {
  client = null;
}

// ---------------------------------------------------------------------------
// Error inspection
// ---------------------------------------------------------------------------

const responseErrorSchema = z.object({
  meta: z
    .object({
      body: z
        .object({
          error: z.object({ type: z.string().optional() }).passthrough().optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
});

/** Reads the `error.type` reported in a failed OpenSearch response body. */
export function openSearchErrorType(err: unknown): string | null {
  const parsed = responseErrorSchema.safeParse(err);
  if (!parsed.success) return null;
  return parsed.data.meta?.body?.error?.type ?? null;
}
