export type InstanceStatus =
  | 'RUNNING'
  | 'WAITING_HUMAN'
  | 'COMPLETED'
  | 'FAILED';

export interface InstanceFailure {
  stepId: string;
  actionIndex: number;
  actionType: string;
  error: string;
}

export interface WorkflowInstance {
  id: string;
  workflowId: string;
  eventId: string;
  currentStepId: string;
  status: InstanceStatus;
  context: Record<string, unknown>;
  failure: InstanceFailure | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewWorkflowInstance = Omit<
  WorkflowInstance,
  'createdAt' | 'updatedAt'
>;

export type WorkflowInstanceUpdate = Pick<
  WorkflowInstance,
  'currentStepId' | 'status' | 'context' | 'failure'
>;

export interface InstanceHistoryRecord {
  id: string;
  instanceId: string;
  fromStepId: string | null;
  toStepId: string;
  status: InstanceStatus;
  recordedAt: Date;
}

export function isTerminalStatus(status: InstanceStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}
