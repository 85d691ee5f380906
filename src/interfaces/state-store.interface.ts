export interface StoredCheckpoint {
  threadId: string;
  namespace: string;
  version: number;
  payload: Record<string, unknown>;
  updatedAt: Date;
}

export interface StateStoreWrite {
  version: number;
  payload: Record<string, unknown>;
}

export interface IStateStore {
  /** False for stores that lose data when the process exits. */
  readonly durable: boolean;

  /** Idempotent schema initialization. */
  setup(): Promise<void>;

  get(namespace: string, threadId: string): Promise<StoredCheckpoint | null>;

  /**
   * Full overwrite of the thread's checkpoint. Resolves once committed.
   * @param expectedVersion - version currently stored, or null when the
   *   thread must not exist yet. A mismatch rejects with CheckpointConflictError.
   */
  put(
    namespace: string,
    threadId: string,
    record: StateStoreWrite,
    expectedVersion: number | null,
  ): Promise<void>;

  close(): Promise<void>;
}
