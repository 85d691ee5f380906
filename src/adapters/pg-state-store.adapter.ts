import type { Pool } from 'pg';
import { CheckpointConflictError } from '../errors/checkpoint-conflict.error';
import type {
  IStateStore,
  StateStoreWrite,
  StoredCheckpoint,
} from '../interfaces/state-store.interface';
import {
  assertValidTableName,
  checkpointTableDdl,
} from '../utils/checkpoint-table-ddl';

interface PgCheckpointRow {
  thread_id: string;
  checkpoint_ns: string;
  version: number;
  checkpoint: unknown;
  updated_at: Date | string;
}

export interface PgStateStoreOptions {
  /** Close the pool on close(). Default: true */
  ownsPool?: boolean;
}

export class PgStateStore implements IStateStore {
  readonly durable = true;
  private readonly ownsPool: boolean;

  constructor(
    private readonly pool: Pool,
    private readonly tableName: string,
    options: PgStateStoreOptions = {},
  ) {
    assertValidTableName(tableName);
    this.ownsPool = options.ownsPool ?? true;
  }

  async setup(): Promise<void> {
    await this.pool.query(checkpointTableDdl(this.tableName));
  }

  async get(
    namespace: string,
    threadId: string,
  ): Promise<StoredCheckpoint | null> {
    const result = await this.pool.query<PgCheckpointRow>(
      `SELECT thread_id, checkpoint_ns, version, checkpoint, updated_at
       FROM ${this.tableName}
       WHERE thread_id = $1 AND checkpoint_ns = $2`,
      [threadId, namespace],
    );

    if (result.rows.length === 0) return null;
    return this.toStoredCheckpoint(result.rows[0]);
  }

  async put(
    namespace: string,
    threadId: string,
    record: StateStoreWrite,
    expectedVersion: number | null,
  ): Promise<void> {
    const checkpointJson = JSON.stringify(record.payload);

    const result =
      expectedVersion === null
        ? await this.pool.query(
            `INSERT INTO ${this.tableName} (thread_id, checkpoint_ns, version, checkpoint, updated_at)
             VALUES ($1, $2, $3, $4::jsonb, CURRENT_TIMESTAMP)
             ON CONFLICT (thread_id, checkpoint_ns) DO NOTHING`,
            [threadId, namespace, record.version, checkpointJson],
          )
        : await this.pool.query(
            `UPDATE ${this.tableName} SET
               version = $3,
               checkpoint = $4::jsonb,
               updated_at = CURRENT_TIMESTAMP
             WHERE thread_id = $1 AND checkpoint_ns = $2 AND version = $5`,
            [threadId, namespace, record.version, checkpointJson, expectedVersion],
          );

    if (result.rowCount !== 1) {
      throw new CheckpointConflictError(namespace, threadId, expectedVersion);
    }
  }

  async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }

  private toStoredCheckpoint(row: PgCheckpointRow): StoredCheckpoint {
    const payload: unknown =
      typeof row.checkpoint === 'string'
        ? JSON.parse(row.checkpoint)
        : row.checkpoint;

    return {
      threadId: row.thread_id,
      namespace: row.checkpoint_ns,
      version: Number(row.version),
      payload:
        typeof payload === 'object' && payload !== null && !Array.isArray(payload)
          ? { ...payload }
          : {},
      updatedAt: new Date(row.updated_at),
    };
  }
}
