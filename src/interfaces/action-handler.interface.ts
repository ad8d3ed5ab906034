import type { WorkflowActionDefinition } from './workflow-definition.interface';

export type ActionResultStatus = 'SUCCEEDED' | 'FAILED' | 'NOT_IMPLEMENTED';

export interface ActionResult {
  status: ActionResultStatus;
  output: Record<string, unknown>;
}

export interface IActionHandler {
  execute(
    action: WorkflowActionDefinition,
    context: Record<string, unknown>,
  ): Promise<ActionResult>;
}
