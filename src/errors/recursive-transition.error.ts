export class RecursiveTransitionError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly stepId: string,
    public readonly maxSteps: number,
  ) {
    super(
      `Instance ${instanceId} visited more than ${maxSteps} steps in one pass (last step "${stepId}"). ` +
        `Check for transition loops.`,
    );
    this.name = 'RecursiveTransitionError';
  }
}
