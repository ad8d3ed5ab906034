export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly actionType: string,
    public readonly handler1: string,
    public readonly handler2: string,
  ) {
    super(
      `Duplicate action type "${actionType}". ` +
        `Both ${handler1} and ${handler2} are registered for the same type.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
