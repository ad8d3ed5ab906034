import { Inject, Injectable } from '@nestjs/common';
import { ActionRegistry } from './action-registry.service';
import { WorkflowNotFoundError } from '../errors/workflow-not-found.error';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type { IWorkflowDefinitionSource } from '../interfaces/workflow-definition-source.interface';
import { validateWorkflowDefinition } from '../utils/validate-workflow-definition';
import { WORKFLOW_DEFINITION_SOURCE } from '../workflow.constants';

@Injectable()
export class WorkflowDefinitionService {
  constructor(
    private readonly registry: ActionRegistry,
    @Inject(WORKFLOW_DEFINITION_SOURCE)
    private readonly source: IWorkflowDefinitionSource,
  ) {}

  /**
   * Checks a definition offered for creation against the registered action
   * types. Throws DefinitionValidationError naming the first problem.
   */
  validate(input: unknown): WorkflowDefinition {
    return validateWorkflowDefinition(input, this.registry.getTypes());
  }

  listActive(): Promise<WorkflowDefinition[]> {
    return this.source.listActive();
  }

  async getOrThrow(id: string): Promise<WorkflowDefinition> {
    const definition = await this.source.findById(id);
    if (!definition) {
      throw new WorkflowNotFoundError(id);
    }
    return definition;
  }
}
