import type { WorkflowDefinition } from './workflow-definition.interface';

/** Read API over stored workflow definitions. */
export interface IWorkflowDefinitionSource {
  /** Active definitions, in storage order. */
  listActive(): Promise<WorkflowDefinition[]>;
  findById(id: string): Promise<WorkflowDefinition | null>;
}
