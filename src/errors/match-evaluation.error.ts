export class MatchEvaluationError extends Error {
  constructor(
    public readonly condition: unknown,
    reason: string,
  ) {
    super(`Malformed condition: ${reason}`);
    this.name = 'MatchEvaluationError';
  }
}
