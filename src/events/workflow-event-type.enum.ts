export enum WorkflowEventType {
  INSTANCE_CREATED = 'workflow.instance.created',
  STEP_TRANSITION = 'workflow.instance.step-transition',
  STATUS_CHANGED = 'workflow.instance.status-changed',
  ENTRY_REJECTED = 'workflow.entry.rejected',
  ENTRY_DEAD_LETTERED = 'workflow.entry.dead-lettered',
}
