#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { checkpointTableDdl } from '../utils/checkpoint-table-ddl';
import { DEFAULT_CHECKPOINT_TABLE } from '../engine.constants';

const COMMAND = 'conversation-engine generate-migration';

/** dbmate-compatible migration creating the checkpoint table. */
export function generateMigration(tableName: string): string {
  return `-- migrate:up
${checkpointTableDdl(tableName)}
-- migrate:down
DROP INDEX IF EXISTS idx_${tableName}_updated_at;
DROP TABLE IF EXISTS ${tableName};
`;
}

export function migrationFileName(tableName: string, now: Date): string {
  const timestamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `${timestamp}_create_${tableName}.sql`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      `Usage: ${COMMAND} [tableName]\n\n` +
        'Generates a dbmate-compatible SQL migration for the conversation checkpoint table.\n\n' +
        'Arguments:\n' +
        `  tableName    The database table name (default: ${DEFAULT_CHECKPOINT_TABLE})\n\n` +
        'Example:\n' +
        `  ${COMMAND} ${DEFAULT_CHECKPOINT_TABLE}`,
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1] ?? DEFAULT_CHECKPOINT_TABLE;

  let sql: string;
  try {
    sql = generateMigration(tableName);
  } catch (error) {
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  }

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const filePath = path.join(
    migrationsDir,
    migrationFileName(tableName, new Date()),
  );
  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
