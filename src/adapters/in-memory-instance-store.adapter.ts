import { randomUUID } from 'crypto';
import type { IInstanceStoreAdapter } from '../interfaces/instance-store-adapter.interface';
import type {
  InstanceHistoryRecord,
  InstanceStatus,
  NewWorkflowInstance,
  WorkflowInstance,
  WorkflowInstanceUpdate,
} from '../interfaces/workflow-instance.interface';
import { cloneJson } from '../utils/clone-json';

interface InMemoryState {
  instances: Map<string, WorkflowInstance>;
  history: InstanceHistoryRecord[];
}

function cloneInstance(instance: WorkflowInstance): WorkflowInstance {
  return {
    id: instance.id,
    workflowId: instance.workflowId,
    eventId: instance.eventId,
    currentStepId: instance.currentStepId,
    status: instance.status,
    context: cloneJson(instance.context),
    failure: instance.failure ? { ...instance.failure } : null,
    createdAt: new Date(instance.createdAt),
    updatedAt: new Date(instance.updatedAt),
  };
}

function cloneHistoryRecord(
  record: InstanceHistoryRecord,
): InstanceHistoryRecord {
  return { ...record, recordedAt: new Date(record.recordedAt) };
}

function cloneState(state: InMemoryState): InMemoryState {
  const instances = new Map<string, WorkflowInstance>();
  for (const [id, row] of state.instances.entries()) {
    instances.set(id, cloneInstance(row));
  }
  return { instances, history: state.history.map(cloneHistoryRecord) };
}

/**
 * Instance store kept in process memory. Transactions run one at a time
 * against a copy of the state that replaces it on success, so a row read
 * inside a transaction cannot change underneath it.
 */
export class InMemoryInstanceStoreAdapter implements IInstanceStoreAdapter {
  private state: InMemoryState;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    state?: InMemoryState,
    private readonly transactionBound = false,
  ) {
    this.state = state ?? { instances: new Map(), history: [] };
  }

  async findById(
    id: string,
    _lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const row = this.state.instances.get(id);
    return row ? cloneInstance(row) : null;
  }

  async findByWorkflowAndEvent(
    workflowId: string,
    eventId: string,
    _lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const row = this.findPair(workflowId, eventId);
    return row ? cloneInstance(row) : null;
  }

  async insert(
    instance: NewWorkflowInstance,
  ): Promise<WorkflowInstance | null> {
    if (this.findPair(instance.workflowId, instance.eventId)) {
      return null;
    }
    const now = new Date();
    const row = cloneInstance({ ...instance, createdAt: now, updatedAt: now });
    this.state.instances.set(row.id, row);
    return cloneInstance(row);
  }

  async update(id: string, data: WorkflowInstanceUpdate): Promise<void> {
    const row = this.state.instances.get(id);
    if (!row) return;
    this.state.instances.set(
      id,
      cloneInstance({ ...row, ...data, updatedAt: new Date() }),
    );
  }

  async compareAndSetStatus(
    id: string,
    expected: InstanceStatus,
    next: InstanceStatus,
    context: Record<string, unknown>,
  ): Promise<boolean> {
    const row = this.state.instances.get(id);
    if (!row || row.status !== expected) {
      return false;
    }
    this.state.instances.set(
      id,
      cloneInstance({ ...row, status: next, context, updatedAt: new Date() }),
    );
    return true;
  }

  async insertHistory(
    data: Omit<InstanceHistoryRecord, 'id' | 'recordedAt'>,
  ): Promise<void> {
    this.state.history.push({
      id: randomUUID(),
      instanceId: data.instanceId,
      fromStepId: data.fromStepId,
      toStepId: data.toStepId,
      status: data.status,
      recordedAt: new Date(),
    });
  }

  async findByStatus(status: InstanceStatus): Promise<WorkflowInstance[]> {
    const matches: WorkflowInstance[] = [];
    for (const row of this.state.instances.values()) {
      if (row.status === status) {
        matches.push(cloneInstance(row));
      }
    }
    return matches;
  }

  /** History rows for one instance, oldest first. */
  async findHistory(instanceId: string): Promise<InstanceHistoryRecord[]> {
    return this.state.history
      .filter((record) => record.instanceId === instanceId)
      .map(cloneHistoryRecord);
  }

  async transaction<T>(
    cb: (adapter: IInstanceStoreAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.transactionBound) {
      return cb(this);
    }

    const run = this.queue.then(async () => {
      const txState = cloneState(this.state);
      const result = await cb(new InMemoryInstanceStoreAdapter(txState, true));
      this.state = txState;
      return result;
    });
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private findPair(
    workflowId: string,
    eventId: string,
  ): WorkflowInstance | undefined {
    for (const row of this.state.instances.values()) {
      if (row.workflowId === workflowId && row.eventId === eventId) {
        return row;
      }
    }
    return undefined;
  }
}
