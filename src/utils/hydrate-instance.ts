import { InvalidStateError } from '../errors/invalid-state.error';
import type {
  InstanceFailure,
  InstanceStatus,
  WorkflowInstance,
} from '../interfaces/workflow-instance.interface';
import { isPlainObject } from './resolve-path';

/** A row of the instance table as the Postgres drivers return it. */
export interface InstanceRow {
  id: string;
  workflow_id: string;
  event_id: string;
  current_step_id: string;
  status: string;
  context: unknown;
  failure: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

const STATUSES: readonly InstanceStatus[] = [
  'RUNNING',
  'WAITING_HUMAN',
  'COMPLETED',
  'FAILED',
];

function parseJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function hydrateFailure(id: string, value: unknown): InstanceFailure | null {
  const failure = parseJson(value);
  if (failure === null || failure === undefined) return null;
  if (
    !isPlainObject(failure) ||
    typeof failure.stepId !== 'string' ||
    typeof failure.actionIndex !== 'number' ||
    typeof failure.actionType !== 'string' ||
    typeof failure.error !== 'string'
  ) {
    throw new InvalidStateError(id, `Instance ${id} has an invalid failure record`);
  }
  return {
    stepId: failure.stepId,
    actionIndex: failure.actionIndex,
    actionType: failure.actionType,
    error: failure.error,
  };
}

/**
 * Turns a stored instance row into a WorkflowInstance, rejecting rows whose
 * status, context or timestamps cannot be read back.
 */
export function hydrateInstance(row: unknown): WorkflowInstance {
  if (!isPlainObject(row) || typeof row.id !== 'string') {
    throw new InvalidStateError('unknown', 'Instance row has no id');
  }
  const { id } = row;

  if (
    typeof row.workflow_id !== 'string' ||
    typeof row.event_id !== 'string' ||
    typeof row.current_step_id !== 'string'
  ) {
    throw new InvalidStateError(id, `Instance ${id} has missing key columns`);
  }

  const status = STATUSES.find((candidate) => candidate === row.status);
  if (!status) {
    throw new InvalidStateError(
      id,
      `Instance ${id} has invalid status ${String(row.status)}`,
    );
  }

  const context = parseJson(row.context);
  if (!isPlainObject(context)) {
    throw new InvalidStateError(id, `Instance ${id} has invalid context payload`);
  }

  const createdAt = toDate(row.created_at);
  const updatedAt = toDate(row.updated_at);
  if (!createdAt || !updatedAt) {
    throw new InvalidStateError(id, `Instance ${id} has invalid timestamps`);
  }

  return {
    id,
    workflowId: row.workflow_id,
    eventId: row.event_id,
    currentStepId: row.current_step_id,
    status,
    context,
    failure: hydrateFailure(id, row.failure),
    createdAt,
    updatedAt,
  };
}
