import type {
  InstanceHistoryRecord,
  InstanceStatus,
  NewWorkflowInstance,
  WorkflowInstance,
  WorkflowInstanceUpdate,
} from './workflow-instance.interface';

export interface IInstanceStoreAdapter {
  /**
   * Find an instance by ID.
   * @param lock - If true, use SELECT ... FOR UPDATE
   */
  findById(id: string, lock?: boolean): Promise<WorkflowInstance | null>;

  /**
   * Find the instance spawned for a (workflow, event) pair.
   * @param lock - If true, use SELECT ... FOR UPDATE
   */
  findByWorkflowAndEvent(
    workflowId: string,
    eventId: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null>;

  /**
   * Insert a new instance.
   * Resolves to null, without writing, when an instance already exists
   * for the same (workflowId, eventId) pair.
   */
  insert(instance: NewWorkflowInstance): Promise<WorkflowInstance | null>;

  /**
   * Overwrite the mutable columns of an existing instance.
   */
  update(id: string, data: WorkflowInstanceUpdate): Promise<void>;

  /**
   * Atomically move an instance from `expected` to `next` status and
   * replace its context. Resolves to false when the stored status is not
   * `expected`, in which case nothing is written.
   */
  compareAndSetStatus(
    id: string,
    expected: InstanceStatus,
    next: InstanceStatus,
    context: Record<string, unknown>,
  ): Promise<boolean>;

  /**
   * Insert a step/status history record.
   */
  insertHistory(
    data: Omit<InstanceHistoryRecord, 'id' | 'recordedAt'>,
  ): Promise<void>;

  /**
   * Find all instances in a given status.
   * Lets callers list FAILED or WAITING_HUMAN instances for inspection.
   */
  findByStatus(status: InstanceStatus): Promise<WorkflowInstance[]>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(
    cb: (adapter: IInstanceStoreAdapter) => Promise<T>,
  ): Promise<T>;
}
