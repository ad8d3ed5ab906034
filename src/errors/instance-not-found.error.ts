export class InstanceNotFoundError extends Error {
  constructor(public readonly instanceId: string) {
    super(`Workflow instance "${instanceId}" does not exist.`);
    this.name = 'InstanceNotFoundError';
  }
}
