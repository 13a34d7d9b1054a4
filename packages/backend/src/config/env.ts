import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
dotenv.config();

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().positive());

const envSchema = z.object({
  PORT: positiveInt('3000'),

  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),

  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a valid URL')
    .startsWith('postgresql://', 'DATABASE_URL must be a PostgreSQL connection URL'),

  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET is required' })
    .min(32, 'JWT_SECRET must be at least 32 characters'),

  // OpenSearch
  OPENSEARCH_NODE_URLS: z
    .string()
    .default('http://localhost:9200')
    .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean)),

  OPENSEARCH_USERNAME: z
    .string()
    .optional(),

  OPENSEARCH_PASSWORD: z
    .string()
    .optional(),

  OPENSEARCH_REQUEST_TIMEOUT_MS: positiveInt('10000'),

  OPENSEARCH_SSL_CERT_PATH: z
    .string()
    .optional(),

  // Index lifecycle at boot: leave alone, create missing indexes, or push mappings to all of them
  SEARCH_INDEXES_ON_STARTUP: z
    .enum(['none', 'create', 'reconcile'])
    .default('create'),

  // Reindex worker pool
  REINDEX_WORKERS: positiveInt('2'),

  REINDEX_QUEUE_DEPTH: positiveInt('5'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    console.error('Environment validation failed:\n' + formatted);
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();
