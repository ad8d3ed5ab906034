import type { Pool, PoolClient } from 'pg';
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
import type { InstanceRow } from '../utils/hydrate-instance';

const INSTANCE_COLUMNS =
  'id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at';

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

export class PgInstanceStoreAdapter implements IInstanceStoreAdapter {
  private readonly historyTable: string;

  constructor(
    private readonly pool: Pool,
    private readonly tableName: string,
    private readonly client?: PoolClient,
  ) {
    assertTableName(tableName);
    this.historyTable = assertTableName(`${tableName}_history`);
  }

  async findById(id: string, lock?: boolean): Promise<WorkflowInstance | null> {
    const lockClause = lock ? ' FOR UPDATE' : '';
    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tableName}
       WHERE id = $1::uuid${lockClause}`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return hydrateInstance(result.rows[0]);
  }

  async findByWorkflowAndEvent(
    workflowId: string,
    eventId: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const lockClause = lock ? ' FOR UPDATE' : '';
    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tableName}
       WHERE workflow_id = $1 AND event_id = $2${lockClause}`,
      [workflowId, eventId],
    );

    if (result.rows.length === 0) return null;
    return hydrateInstance(result.rows[0]);
  }

  async insert(instance: NewWorkflowInstance): Promise<WorkflowInstance | null> {
    const result = await this.getConn().query<InstanceRow>(
      `INSERT INTO ${this.tableName}
       (id, workflow_id, event_id, current_step_id, status, context, failure, created_at, updated_at)
       VALUES ($1::uuid, $2, $3, $4, $5, $6::jsonb, $7::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
       ON CONFLICT (workflow_id, event_id) DO NOTHING
       RETURNING ${INSTANCE_COLUMNS}`,
      [
        instance.id,
        instance.workflowId,
        instance.eventId,
        instance.currentStepId,
        instance.status,
        JSON.stringify(instance.context),
        instance.failure ? JSON.stringify(instance.failure) : null,
      ],
    );

    if (result.rows.length === 0) return null;
    return hydrateInstance(result.rows[0]);
  }

  async update(id: string, data: WorkflowInstanceUpdate): Promise<void> {
    await this.getConn().query(
      `UPDATE ${this.tableName} SET
         current_step_id = $2,
         status = $3,
         context = $4::jsonb,
         failure = $5::jsonb,
         updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid`,
      [
        id,
        data.currentStepId,
        data.status,
        JSON.stringify(data.context),
        data.failure ? JSON.stringify(data.failure) : null,
      ],
    );
  }

  async compareAndSetStatus(
    id: string,
    expected: InstanceStatus,
    next: InstanceStatus,
    context: Record<string, unknown>,
  ): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.tableName} SET
         status = $3,
         context = $4::jsonb,
         updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid AND status = $2`,
      [id, expected, next, JSON.stringify(context)],
    );

    return (result.rowCount ?? 0) === 1;
  }

  async insertHistory(
    data: Omit<InstanceHistoryRecord, 'id' | 'recordedAt'>,
  ): Promise<void> {
    await this.getConn().query(
      `INSERT INTO ${this.historyTable}
       (instance_id, from_step_id, to_step_id, status)
       VALUES ($1::uuid, $2, $3, $4)`,
      [data.instanceId, data.fromStepId, data.toStepId, data.status],
    );
  }

  async findByStatus(status: InstanceStatus): Promise<WorkflowInstance[]> {
    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tableName}
       WHERE status = $1
       ORDER BY created_at`,
      [status],
    );

    return result.rows.map((row) => hydrateInstance(row));
  }

  async transaction<T>(
    cb: (adapter: IInstanceStoreAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgInstanceStoreAdapter(
        this.pool,
        this.tableName,
        client,
      );
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
