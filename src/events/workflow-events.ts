import type {
  InstanceFailure,
  InstanceStatus,
} from '../interfaces/workflow-instance.interface';

export interface InstanceCreatedEvent {
  workflowId: string;
  instanceId: string;
  eventId: string;
  initialStepId: string;
  timestamp: Date;
}

export interface StepTransitionEvent {
  workflowId: string;
  instanceId: string;
  fromStepId: string;
  toStepId: string;
  timestamp: Date;
}

export interface InstanceStatusChangedEvent {
  workflowId: string;
  instanceId: string;
  stepId: string;
  fromStatus: InstanceStatus;
  toStatus: InstanceStatus;
  failure: InstanceFailure | null;
  timestamp: Date;
}

export interface EntryRejectedEvent {
  groupName: string;
  consumerName: string;
  entryId: string;
  reason: string;
  timestamp: Date;
}

export interface EntryDeadLetteredEvent {
  groupName: string;
  consumerName: string;
  entryId: string;
  deliveryCount: number;
  fields: Record<string, string>;
  timestamp: Date;
}
