export const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function assertValidTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

/** Idempotent DDL for the checkpoint table, one row per (thread, namespace). */
export function checkpointTableDdl(tableName: string): string {
  assertValidTableName(tableName);

  return `CREATE TABLE IF NOT EXISTS ${tableName} (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    version INTEGER NOT NULL,
    checkpoint JSONB NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (thread_id, checkpoint_ns)
);

CREATE INDEX IF NOT EXISTS idx_${tableName}_updated_at
    ON ${tableName} (updated_at);
`;
}
