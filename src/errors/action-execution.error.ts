export class ActionExecutionError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly stepId: string,
    public readonly actionIndex: number,
    public readonly actionType: string,
    public readonly reason: string,
  ) {
    super(
      `Action ${actionIndex} (${actionType}) of step "${stepId}" failed for instance ${instanceId}: ${reason}`,
    );
    this.name = 'ActionExecutionError';
  }
}
