export class WorkflowNotFoundError extends Error {
  constructor(public readonly workflowId: string) {
    super(`No workflow definition found with id "${workflowId}".`);
    this.name = 'WorkflowNotFoundError';
  }
}
