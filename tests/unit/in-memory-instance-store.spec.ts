import { InMemoryInstanceStoreAdapter } from '../../src/adapters/in-memory-instance-store.adapter';
import type { NewWorkflowInstance } from '../../src/interfaces/workflow-instance.interface';

function newInstance(overrides: Partial<NewWorkflowInstance> = {}): NewWorkflowInstance {
  return {
    id: 'inst-1',
    workflowId: 'wf-1',
    eventId: 'evt-1',
    currentStepId: 'start',
    status: 'RUNNING',
    context: { data: { n: 1 } },
    failure: null,
    ...overrides,
  };
}

describe('InMemoryInstanceStoreAdapter', () => {
  let store: InMemoryInstanceStoreAdapter;

  beforeEach(() => {
    store = new InMemoryInstanceStoreAdapter();
  });

  it('should insert and find by id and by (workflow, event)', async () => {
    const inserted = await store.insert(newInstance());

    expect(inserted?.createdAt).toBeInstanceOf(Date);
    expect((await store.findById('inst-1'))?.workflowId).toBe('wf-1');
    expect((await store.findByWorkflowAndEvent('wf-1', 'evt-1'))?.id).toBe('inst-1');
    expect(await store.findByWorkflowAndEvent('wf-1', 'evt-2')).toBeNull();
  });

  it('should refuse a second instance for the same (workflow, event)', async () => {
    await store.insert(newInstance());

    expect(await store.insert(newInstance({ id: 'inst-2' }))).toBeNull();
    expect(await store.findById('inst-2')).toBeNull();
    expect(await store.insert(newInstance({ id: 'inst-3', workflowId: 'wf-2' }))).not.toBeNull();
  });

  it('should hand out copies that do not alias stored state', async () => {
    await store.insert(newInstance());
    const read = await store.findById('inst-1');
    if (!read) throw new Error('instance missing');

    read.context.data = 'changed';

    expect((await store.findById('inst-1'))?.context).toEqual({ data: { n: 1 } });
  });

  it('should compare-and-set the status', async () => {
    await store.insert(newInstance({ status: 'WAITING_HUMAN' }));

    expect(
      await store.compareAndSetStatus('inst-1', 'WAITING_HUMAN', 'RUNNING', { ok: true }),
    ).toBe(true);
    expect(
      await store.compareAndSetStatus('inst-1', 'WAITING_HUMAN', 'RUNNING', { ok: false }),
    ).toBe(false);

    const stored = await store.findById('inst-1');
    expect(stored?.status).toBe('RUNNING');
    expect(stored?.context).toEqual({ ok: true });
  });

  it('should list instances by status', async () => {
    await store.insert(newInstance());
    await store.insert(newInstance({ id: 'inst-2', eventId: 'evt-2', status: 'FAILED' }));

    expect((await store.findByStatus('FAILED')).map((row) => row.id)).toEqual(['inst-2']);
  });

  it('should commit a transaction that resolves', async () => {
    await store.transaction(async (tx) => {
      await tx.insert(newInstance());
      await tx.insertHistory({
        instanceId: 'inst-1',
        fromStepId: null,
        toStepId: 'start',
        status: 'RUNNING',
      });
    });

    expect(await store.findById('inst-1')).not.toBeNull();
    expect(await store.findHistory('inst-1')).toHaveLength(1);
  });

  it('should discard the writes of a transaction that rejects', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.insert(newInstance());
        throw new Error('rollback');
      }),
    ).rejects.toThrow('rollback');

    expect(await store.findById('inst-1')).toBeNull();
  });

  it('should run transactions one at a time', async () => {
    await store.insert(newInstance({ status: 'WAITING_HUMAN' }));
    const order: string[] = [];

    const resume = (label: string) =>
      store.transaction(async (tx) => {
        const row = await tx.findById('inst-1', true);
        order.push(`${label}:${row?.status}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        return tx.compareAndSetStatus('inst-1', 'WAITING_HUMAN', 'RUNNING', {});
      });

    const results = await Promise.all([resume('a'), resume('b')]);

    expect(results).toEqual([true, false]);
    expect(order).toEqual(['a:WAITING_HUMAN', 'b:RUNNING']);
  });
});
