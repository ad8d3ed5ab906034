import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { IInstanceStoreAdapter } from '../interfaces/instance-store-adapter.interface';
import type {
  InstanceHistoryRecord,
  InstanceStatus,
  NewWorkflowInstance,
  WorkflowInstance,
  WorkflowInstanceUpdate,
} from '../interfaces/workflow-instance.interface';
import { assertTableName } from '../utils/assert-table-name';
import { hydrateInstance } from '../utils/hydrate-instance';

/**
 * The part of a Drizzle Postgres database (or transaction) this adapter
 * uses. `drizzle(pool)` from `drizzle-orm/node-postgres` satisfies it.
 */
export interface DrizzleSqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
  transaction<T>(cb: (tx: DrizzleSqlExecutor) => Promise<T>): Promise<T>;
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...], rowCount }
 */
function extractRows(result: unknown): unknown[] {
  if (Array.isArray(result)) return result;
  if (result && typeof result === 'object' && 'rows' in result) {
    const { rows } = result;
    return Array.isArray(rows) ? rows : [];
  }
  return [];
}

function extractRowCount(result: unknown): number {
  if (result && typeof result === 'object') {
    if ('rowCount' in result && typeof result.rowCount === 'number') {
      return result.rowCount;
    }
    if ('count' in result && typeof result.count === 'number') {
      return result.count;
    }
  }
  return 0;
}

export class DrizzleInstanceStoreAdapter implements IInstanceStoreAdapter {
  private readonly table: SQL;
  private readonly historyTable: SQL;

  constructor(
    private readonly db: DrizzleSqlExecutor,
    private readonly tableName: string,
  ) {
    this.table = sql.raw(assertTableName(tableName));
    this.historyTable = sql.raw(assertTableName(`${tableName}_history`));
  }

  async findById(id: string, lock?: boolean): Promise<WorkflowInstance | null> {
    const lockClause = lock ? sql` FOR UPDATE` : sql``;
    const result = await this.db.execute(
      sql`SELECT id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at FROM ${this.table} WHERE id = ${id}${lockClause}`,
    );

    const rows = extractRows(result);
    return rows.length === 0 ? null : hydrateInstance(rows[0]);
  }

  async findByWorkflowAndEvent(
    workflowId: string,
    eventId: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const lockClause = lock ? sql` FOR UPDATE` : sql``;
    const result = await this.db.execute(
      sql`SELECT id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at FROM ${this.table} WHERE workflow_id = ${workflowId} AND event_id = ${eventId}${lockClause}`,
    );

    const rows = extractRows(result);
    return rows.length === 0 ? null : hydrateInstance(rows[0]);
  }

  async insert(instance: NewWorkflowInstance): Promise<WorkflowInstance | null> {
    const contextJson = JSON.stringify(instance.context);
    const failureJson = instance.failure
      ? JSON.stringify(instance.failure)
      : null;

    const result = await this.db.execute(
      sql`INSERT INTO ${this.table} (id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at)
          VALUES (${instance.id}, ${instance.workflowId}, ${instance.eventId}, ${instance.currentStepId}, ${instance.status}, ${contextJson}::jsonb, ${failureJson}::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
          ON CONFLICT (workflow_id, event_id) DO NOTHING
          RETURNING id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at`,
    );

    const rows = extractRows(result);
    return rows.length === 0 ? null : hydrateInstance(rows[0]);
  }

  async update(id: string, data: WorkflowInstanceUpdate): Promise<void> {
    const contextJson = JSON.stringify(data.context);
    const failureJson = data.failure ? JSON.stringify(data.failure) : null;

    await this.db.execute(
      sql`UPDATE ${this.table} SET
            current_step_id = ${data.currentStepId},
            status = ${data.status},
            context = ${contextJson}::jsonb,
            failure = ${failureJson}::jsonb,
            updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id}`,
    );
  }

  async compareAndSetStatus(
    id: string,
    expected: InstanceStatus,
    next: InstanceStatus,
    context: Record<string, unknown>,
  ): Promise<boolean> {
    const contextJson = JSON.stringify(context);
    const result = await this.db.execute(
      sql`UPDATE ${this.table} SET
            status = ${next},
            context = ${contextJson}::jsonb,
            updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id} AND status = ${expected}`,
    );

    return extractRowCount(result) === 1;
  }

  async insertHistory(
    data: Omit<InstanceHistoryRecord, 'id' | 'recordedAt'>,
  ): Promise<void> {
    await this.db.execute(
      sql`INSERT INTO ${this.historyTable} (instance_id, from_step_id, to_step_id, status)
          VALUES (${data.instanceId}, ${data.fromStepId}, ${data.toStepId}, ${data.status})`,
    );
  }

  async findByStatus(status: InstanceStatus): Promise<WorkflowInstance[]> {
    const result = await this.db.execute(
      sql`SELECT id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at FROM ${this.table} WHERE status = ${status} ORDER BY created_at`,
    );

    return extractRows(result).map((row) => hydrateInstance(row));
  }

  async transaction<T>(
    cb: (adapter: IInstanceStoreAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) => {
      const txAdapter = new DrizzleInstanceStoreAdapter(tx, this.tableName);
      return cb(txAdapter);
    });
  }
}
