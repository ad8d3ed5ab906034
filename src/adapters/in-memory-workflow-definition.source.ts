import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type { IWorkflowDefinitionSource } from '../interfaces/workflow-definition-source.interface';
import { cloneJson } from '../utils/clone-json';

export class InMemoryWorkflowDefinitionSource
  implements IWorkflowDefinitionSource
{
  private readonly definitions = new Map<string, WorkflowDefinition>();

  constructor(definitions: WorkflowDefinition[] = []) {
    for (const definition of definitions) {
      this.add(definition);
    }
  }

  /** Adds or replaces a definition, keeping first-insertion order. */
  add(definition: WorkflowDefinition): void {
    this.definitions.set(definition.id, cloneJson(definition));
  }

  async listActive(): Promise<WorkflowDefinition[]> {
    return Array.from(this.definitions.values())
      .filter((definition) => definition.active)
      .map((definition) => cloneJson(definition));
  }

  async findById(id: string): Promise<WorkflowDefinition | null> {
    const definition = this.definitions.get(id);
    return definition ? cloneJson(definition) : null;
  }
}
