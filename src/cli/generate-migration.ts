import * as fs from 'fs';
import * as path from 'path';
import { assertTableName } from '../utils/assert-table-name';

/** dbmate migration for an instance table and its `_history` table. */
export function generateMigration(tableName: string): string {
  assertTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id UUID PRIMARY KEY DEFAULT uuidv7(),
    workflow_id TEXT NOT NULL,
    event_id TEXT NOT NULL,
    current_step_id TEXT NOT NULL,
    status TEXT NOT NULL,
    context JSONB NOT NULL,
    failure JSONB,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    CONSTRAINT uq_${tableName}_workflow_event UNIQUE (workflow_id, event_id)
);

CREATE INDEX idx_${tableName}_status
    ON ${tableName} (status);

CREATE INDEX idx_${tableName}_context_gin
    ON ${tableName} USING gin (context);

CREATE TABLE ${tableName}_history (
    id UUID PRIMARY KEY DEFAULT uuidv7(),
    instance_id UUID NOT NULL REFERENCES ${tableName}(id),
    from_step_id TEXT,
    to_step_id TEXT NOT NULL,
    status TEXT NOT NULL,
    recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${tableName}_history_instance_id
    ON ${tableName}_history (instance_id);

CREATE INDEX idx_${tableName}_history_recorded_at
    ON ${tableName}_history (recorded_at);

-- migrate:down
DROP TABLE IF EXISTS ${tableName}_history;
DROP TABLE IF EXISTS ${tableName};
`;
}

/** dbmate migration for the table PgWorkflowDefinitionSource reads. */
export function generateDefinitionsMigration(tableName: string): string {
  assertTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    definition JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${tableName}_is_active
    ON ${tableName} (is_active);

-- migrate:down
DROP TABLE IF EXISTS ${tableName};
`;
}

/**
 * Writes a migration to `<dir>/<timestamp>_create_<tableName>.sql` and
 * returns its path.
 */
export function writeMigration(
  tableName: string,
  sql: string,
  migrationsDir: string = path.resolve('db', 'migrations'),
  now: Date = new Date(),
): string {
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${tableName}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  return filePath;
}
