export class InvalidStateError extends Error {
  constructor(
    public readonly instanceId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidStateError';
  }
}
