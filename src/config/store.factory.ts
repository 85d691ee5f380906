import { Logger } from '@nestjs/common';
import { Client } from '@elastic/elasticsearch';
import { Pool } from 'pg';
import { ElasticsearchSearchIndex } from '../adapters/elasticsearch-search-index.adapter';
import { InMemoryStateStore } from '../adapters/in-memory-state-store.adapter';
import { PgStateStore } from '../adapters/pg-state-store.adapter';
import type { ISearchIndex } from '../interfaces/search-index.interface';
import type { IStateStore } from '../interfaces/state-store.interface';
import type { EngineConfig } from './engine.config';

const logger = new Logger('StoreFactory');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * PostgreSQL when reachable. Otherwise the in-memory store if the fallback
 * is allowed, or the connection error.
 */
export async function createStateStore(
  config: EngineConfig,
  createPool: (settings: EngineConfig['postgres']) => Pool = (settings) =>
    new Pool(settings),
): Promise<IStateStore> {
  const pool = createPool(config.postgres);
  const store = new PgStateStore(pool, config.checkpointTable);

  try {
    await store.setup();
    logger.log(
      `PostgreSQL checkpoint store ready at ${config.postgres.host}:${config.postgres.port}/${config.postgres.database}`,
    );
    return store;
  } catch (error) {
    logger.error(`PostgreSQL initialization failed: ${errorMessage(error)}`);
    try {
      await store.close();
    } catch (closeError) {
      logger.debug(`Pool shutdown after failed setup: ${errorMessage(closeError)}`);
    }

    if (!config.allowInMemoryFallback) {
      throw error;
    }
    logger.warn('Falling back to the in-memory checkpoint store');
    return new InMemoryStateStore();
  }
}

/** Null when search is disabled or Elasticsearch cannot be reached. */
export async function createSearchIndex(
  config: EngineConfig,
  createClient: (node: string) => Client = (node) => new Client({ node }),
): Promise<ISearchIndex | null> {
  if (!config.elasticsearchUrl) {
    logger.log('ELASTICSEARCH_URL is empty: conversation search disabled');
    return null;
  }

  const client = createClient(config.elasticsearchUrl);
  const index = new ElasticsearchSearchIndex(client, config.elasticsearchIndex);
  try {
    await index.setup();
    return index;
  } catch (error) {
    logger.warn(
      `Elasticsearch initialization failed, continuing without search: ${errorMessage(error)}`,
    );
    try {
      await index.close();
    } catch (closeError) {
      logger.debug(`Client shutdown after failed setup: ${errorMessage(closeError)}`);
    }
    return null;
  }
}
