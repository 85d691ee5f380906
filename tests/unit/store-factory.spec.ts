import type { Client } from '@elastic/elasticsearch';
import type { Pool } from 'pg';
import { ElasticsearchSearchIndex } from '../../src/adapters/elasticsearch-search-index.adapter';
import { InMemoryStateStore } from '../../src/adapters/in-memory-state-store.adapter';
import { PgStateStore } from '../../src/adapters/pg-state-store.adapter';
import type { EngineConfig } from '../../src/config/engine.config';
import {
  createSearchIndex,
  createStateStore,
} from '../../src/config/store.factory';

function createConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    postgres: {
      host: 'localhost',
      port: 5432,
      user: 'postgres',
      password: 'test-secret',
      database: 'agent_db',
    },
    checkpointTable: 'conversation_checkpoints',
    allowInMemoryFallback: true,
    elasticsearchUrl: 'http://localhost:9200',
    elasticsearchIndex: 'conversations',
    openaiApiKey: '',
    openaiModel: 'gpt-4o-mini',
    replyTimeoutMs: 10000,
    maxSteps: 25,
    indexMaxAttempts: 3,
    indexRetryDelayMs: 500,
    ...overrides,
  };
}

function createMockPool(query: jest.Mock) {
  const end = jest.fn().mockResolvedValue(undefined);
  const pool = { query, end } as unknown as Pool;
  return { pool, end };
}

function createMockClient(info: jest.Mock) {
  const close = jest.fn().mockResolvedValue(undefined);
  const client = {
    info,
    indices: {
      exists: jest.fn().mockResolvedValue(true),
      create: jest.fn(),
    },
    close,
  } as unknown as Client;
  return { client, close };
}

describe('createStateStore', () => {
  it('should return the PostgreSQL store when setup succeeds', async () => {
    const { pool } = createMockPool(jest.fn().mockResolvedValue({ rows: [] }));
    const createPool = jest.fn().mockReturnValue(pool);

    const store = await createStateStore(createConfig(), createPool);

    expect(store).toBeInstanceOf(PgStateStore);
    expect(store.durable).toBe(true);
    expect(createPool).toHaveBeenCalledWith(createConfig().postgres);
  });

  it('should fall back to memory when PostgreSQL is unreachable', async () => {
    const { pool, end } = createMockPool(
      jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED')),
    );

    const store = await createStateStore(createConfig(), () => pool);

    expect(store).toBeInstanceOf(InMemoryStateStore);
    expect(store.durable).toBe(false);
    expect(end).toHaveBeenCalled();
  });

  it('should rethrow when the fallback is disabled', async () => {
    const { pool } = createMockPool(
      jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED')),
    );

    await expect(
      createStateStore(createConfig({ allowInMemoryFallback: false }), () => pool),
    ).rejects.toThrow('connect ECONNREFUSED');
  });
});

describe('createSearchIndex', () => {
  it('should return null when search is disabled', async () => {
    const createClient = jest.fn();

    expect(
      await createSearchIndex(createConfig({ elasticsearchUrl: '' }), createClient),
    ).toBeNull();
    expect(createClient).not.toHaveBeenCalled();
  });

  it('should return the Elasticsearch index when reachable', async () => {
    const { client } = createMockClient(
      jest.fn().mockResolvedValue({ version: { number: '8.15.0' } }),
    );

    const index = await createSearchIndex(createConfig(), () => client);

    expect(index).toBeInstanceOf(ElasticsearchSearchIndex);
  });

  it('should return null and close the client when unreachable', async () => {
    const { client, close } = createMockClient(
      jest.fn().mockRejectedValue(new Error('ConnectionError')),
    );

    expect(await createSearchIndex(createConfig(), () => client)).toBeNull();
    expect(close).toHaveBeenCalled();
  });
});
