export class InvalidStreamEntryError extends Error {
  constructor(
    public readonly entryId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidStreamEntryError';
  }
}
