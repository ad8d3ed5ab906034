export class DefinitionValidationError extends Error {
  constructor(
    public readonly workflowId: string | undefined,
    public readonly reason: string,
  ) {
    super(
      workflowId
        ? `Workflow definition ${workflowId}: ${reason}`
        : `Workflow definition: ${reason}`,
    );
    this.name = 'DefinitionValidationError';
  }
}
