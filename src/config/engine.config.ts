import { registerAs } from '@nestjs/config';
import {
  DEFAULT_CHECKPOINT_TABLE,
  DEFAULT_INDEX_MAX_ATTEMPTS,
  DEFAULT_INDEX_RETRY_DELAY_MS,
  DEFAULT_MAX_STEPS,
  DEFAULT_SEARCH_INDEX_NAME,
} from '../engine.constants';

export function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseBoolEnv(
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

const engineConfig = registerAs('engine', () => ({
  postgres: {
    host: process.env.POSTGRES_HOST || 'localhost',
    port: parseIntEnv(process.env.POSTGRES_PORT, 5432),
    user: process.env.POSTGRES_USER || 'postgres',
    password: process.env.POSTGRES_PASSWORD || 'postgres',
    database: process.env.POSTGRES_DB || 'agent_db',
  },
  checkpointTable: process.env.CHECKPOINT_TABLE || DEFAULT_CHECKPOINT_TABLE,
  allowInMemoryFallback: parseBoolEnv(
    process.env.ALLOW_IN_MEMORY_FALLBACK,
    true,
  ),
  // Empty disables search.
  elasticsearchUrl: process.env.ELASTICSEARCH_URL ?? 'http://localhost:9200',
  elasticsearchIndex:
    process.env.ELASTICSEARCH_INDEX || DEFAULT_SEARCH_INDEX_NAME,
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  openaiModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  replyTimeoutMs: parseIntEnv(process.env.REPLY_TIMEOUT_MS, 10000),
  maxSteps: parseIntEnv(process.env.MAX_STEPS, DEFAULT_MAX_STEPS),
  indexMaxAttempts: parseIntEnv(
    process.env.INDEX_MAX_ATTEMPTS,
    DEFAULT_INDEX_MAX_ATTEMPTS,
  ),
  indexRetryDelayMs: parseIntEnv(
    process.env.INDEX_RETRY_DELAY_MS,
    DEFAULT_INDEX_RETRY_DELAY_MS,
  ),
}));

export type EngineConfig = ReturnType<typeof engineConfig>;

export default engineConfig;
