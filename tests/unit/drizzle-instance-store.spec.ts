import type { SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import { DrizzleInstanceStoreAdapter } from '../../src/adapters/drizzle-instance-store.adapter';
import type { DrizzleSqlExecutor } from '../../src/adapters/drizzle-instance-store.adapter';

const dialect = new PgDialect();

interface ExecutedQuery {
  sql: string;
  params: unknown[];
}

// Mock Drizzle db that renders executed SQL with the Postgres dialect
function createMockDrizzleDb(results: unknown[] = []) {
  const executedQueries: ExecutedQuery[] = [];
  const pending = [...results];

  const execute = jest.fn(async (query: SQL): Promise<unknown> => {
    const { sql, params } = dialect.sqlToQuery(query);
    executedQueries.push({ sql, params });
    return pending.length > 0 ? pending.shift() : { rows: [], rowCount: 0 };
  });

  const transactionCalls = jest.fn();
  const db: DrizzleSqlExecutor = {
    execute,
    transaction<T>(cb: (tx: DrizzleSqlExecutor) => Promise<T>): Promise<T> {
      transactionCalls();
      return cb(db);
    },
  };

  return { db, execute, executedQueries, transactionCalls };
}

const storedRow = {
  id: '6f1c2b1e-0000-4000-8000-000000000001',
  workflow_id: 'wf-1',
  event_id: 'evt-1',
  current_step_id: 'notify',
  status: 'WAITING_HUMAN',
  context: '{"data":{}}',
  failure: null,
  created_at: '2025-01-01T00:00:00.000Z',
  updated_at: '2025-01-01T00:00:00.000Z',
};

describe('DrizzleInstanceStoreAdapter', () => {
  it('should reject invalid table names to prevent SQL injection', () => {
    const { db } = createMockDrizzleDb();
    expect(() => new DrizzleInstanceStoreAdapter(db, "instances' OR 1=1")).toThrow(
      'Invalid table name',
    );
  });

  it('should read node-postgres results', async () => {
    const { db, executedQueries } = createMockDrizzleDb([{ rows: [storedRow] }]);
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    const instance = await adapter.findById(storedRow.id, true);

    expect(instance?.status).toBe('WAITING_HUMAN');
    expect(instance?.context).toEqual({ data: {} });
    expect(executedQueries[0].sql).toContain('FROM workflow_instances WHERE id = $1 FOR UPDATE');
    expect(executedQueries[0].params).toEqual([storedRow.id]);
  });

  it('should read postgres-js results returned as arrays', async () => {
    const { db } = createMockDrizzleDb([[storedRow]]);
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    const instance = await adapter.findByWorkflowAndEvent('wf-1', 'evt-1');
    expect(instance?.id).toBe(storedRow.id);
  });

  it('should insert with ON CONFLICT DO NOTHING', async () => {
    const { db, executedQueries } = createMockDrizzleDb([{ rows: [] }]);
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    const inserted = await adapter.insert({
      id: storedRow.id,
      workflowId: 'wf-1',
      eventId: 'evt-1',
      currentStepId: 'notify',
      status: 'RUNNING',
      context: { a: 1 },
      failure: null,
    });

    expect(inserted).toBeNull();
    expect(executedQueries[0].sql).toContain('ON CONFLICT (workflow_id, event_id) DO NOTHING');
    expect(executedQueries[0].params).toEqual([
      storedRow.id,
      'wf-1',
      'evt-1',
      'notify',
      'RUNNING',
      '{"a":1}',
      null,
    ]);
  });

  it('should report the compare-and-set outcome from the row count', async () => {
    const { db, executedQueries } = createMockDrizzleDb([
      { rows: [], rowCount: 1 },
      { count: 0 },
    ]);
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    expect(
      await adapter.compareAndSetStatus(storedRow.id, 'WAITING_HUMAN', 'RUNNING', {}),
    ).toBe(true);
    expect(
      await adapter.compareAndSetStatus(storedRow.id, 'WAITING_HUMAN', 'RUNNING', {}),
    ).toBe(false);
    expect(executedQueries[0].params).toEqual(['RUNNING', '{}', storedRow.id, 'WAITING_HUMAN']);
  });

  it('should write history to the _history table', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    await adapter.insertHistory({
      instanceId: storedRow.id,
      fromStepId: 'a',
      toStepId: 'b',
      status: 'RUNNING',
    });

    expect(executedQueries[0].sql).toContain('INSERT INTO workflow_instances_history');
    expect(executedQueries[0].params).toEqual([storedRow.id, 'a', 'b', 'RUNNING']);
  });

  it('should run callbacks against a transaction-bound adapter', async () => {
    const { db, transactionCalls } = createMockDrizzleDb();
    const adapter = new DrizzleInstanceStoreAdapter(db, 'workflow_instances');

    const result = await adapter.transaction(async (tx) => {
      expect(tx).toBeInstanceOf(DrizzleInstanceStoreAdapter);
      expect(tx).not.toBe(adapter);
      return tx.findByStatus('FAILED');
    });

    expect(result).toEqual([]);
    expect(transactionCalls).toHaveBeenCalledTimes(1);
  });
});
