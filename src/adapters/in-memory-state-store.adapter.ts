import { CheckpointConflictError } from '../errors/checkpoint-conflict.error';
import type {
  IStateStore,
  StateStoreWrite,
  StoredCheckpoint,
} from '../interfaces/state-store.interface';

function cloneJson(value: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = JSON.parse(JSON.stringify(value));
  return copy;
}

function cloneStored(record: StoredCheckpoint): StoredCheckpoint {
  return {
    threadId: record.threadId,
    namespace: record.namespace,
    version: record.version,
    payload: cloneJson(record.payload),
    updatedAt: new Date(record.updatedAt),
  };
}

function rowKey(namespace: string, threadId: string): string {
  return JSON.stringify([namespace, threadId]);
}

/**
 * Process-local checkpoint store. Not durable: everything is lost when the
 * process exits.
 */
export class InMemoryStateStore implements IStateStore {
  readonly durable = false;
  private readonly rows = new Map<string, StoredCheckpoint>();

  async setup(): Promise<void> {
    // nothing to create
  }

  async get(
    namespace: string,
    threadId: string,
  ): Promise<StoredCheckpoint | null> {
    const row = this.rows.get(rowKey(namespace, threadId));
    return row ? cloneStored(row) : null;
  }

  async put(
    namespace: string,
    threadId: string,
    record: StateStoreWrite,
    expectedVersion: number | null,
  ): Promise<void> {
    const key = rowKey(namespace, threadId);
    const currentVersion = this.rows.get(key)?.version ?? null;
    if (currentVersion !== expectedVersion) {
      throw new CheckpointConflictError(namespace, threadId, expectedVersion);
    }

    this.rows.set(key, {
      threadId,
      namespace,
      version: record.version,
      payload: cloneJson(record.payload),
      updatedAt: new Date(),
    });
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  size(): number {
    return this.rows.size;
  }
}
