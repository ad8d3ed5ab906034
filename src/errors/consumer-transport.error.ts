export class ConsumerTransportError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause: unknown,
  ) {
    super(
      `Event log ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'ConsumerTransportError';
  }
}
